/**
 * CLI Configuration
 *
 * Handles configuration loading and the API client.
 * @module @prepuller/cli/config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { OutputFormat } from './output';

/**
 * Default API URL (a port-forwarded service)
 */
export const DEFAULT_API_URL = 'http://127.0.0.1:8080/prepuller';

/**
 * Config directory path
 */
export const CONFIG_DIR = path.join(os.homedir(), '.prepuller');

/**
 * Config file path
 */
export const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

/**
 * CLI configuration structure
 */
export interface CliConfig {
  apiUrl: string;
  defaultOutputFormat?: OutputFormat;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: CliConfig = {
  apiUrl: DEFAULT_API_URL,
  defaultOutputFormat: 'table',
};

/**
 * API response envelope
 */
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Request the server refused or could not answer
 */
export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

/**
 * Loads configuration from file, then the PREPULLER_API_URL environment variable
 */
export function loadConfig(): CliConfig {
  let fileConfig: Partial<CliConfig> = {};
  try {
    if (fs.existsSync(CONFIG_FILE)) {
      const content = fs.readFileSync(CONFIG_FILE, 'utf-8');
      fileConfig = JSON.parse(content) as Partial<CliConfig>;
    }
  } catch {
    // Ignore errors, use defaults
  }

  const envUrl = process.env.PREPULLER_API_URL;
  return {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...(envUrl ? { apiUrl: envUrl } : {}),
  };
}

/**
 * Saves configuration to file
 */
export function saveConfig(config: Partial<CliConfig>): void {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true, mode: 0o700 });
  }
  const current = loadConfig();
  fs.writeFileSync(CONFIG_FILE, JSON.stringify({ ...current, ...config }, null, 2), { mode: 0o600 });
}

/**
 * Thin fetch wrapper bound to the API base URL
 */
export interface ApiClient {
  baseUrl: string;
  get<T>(path: string): Promise<T>;
  post<T>(path: string, body: unknown): Promise<T>;
  delete<T>(path: string): Promise<T>;
}

/**
 * Unwrap the response envelope
 *
 * @throws {ApiRequestError} For error envelopes and non-JSON answers
 */
export async function readApiResponse<T>(response: Response): Promise<T> {
  let result: ApiResponse<T>;
  try {
    result = (await response.json()) as ApiResponse<T>;
  } catch {
    throw new ApiRequestError(`Server answered HTTP ${response.status} without a JSON body`, 'INVALID_RESPONSE', response.status);
  }

  if (!result.success || result.data === undefined) {
    throw new ApiRequestError(
      result.error?.message ?? `Request failed with HTTP ${response.status}`,
      result.error?.code ?? 'UNKNOWN',
      response.status,
      result.error?.details
    );
  }
  return result.data;
}

/**
 * Creates an API client
 */
export function createApiClient(config?: CliConfig): ApiClient {
  const cfg = config ?? loadConfig();
  const baseUrl = cfg.apiUrl.replace(/\/+$/, '');
  const headers = { 'Content-Type': 'application/json', Accept: 'application/json' };

  const send = async <T>(urlPath: string, init: RequestInit): Promise<T> => {
    let response: Response;
    try {
      response = await fetch(`${baseUrl}${urlPath}`, { ...init, headers });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ApiRequestError(`Cannot reach ${baseUrl}: ${reason}`, 'UNREACHABLE', 0);
    }
    return readApiResponse<T>(response);
  };

  return {
    baseUrl,
    get: <T>(urlPath: string) => send<T>(urlPath, { method: 'GET' }),
    post: <T>(urlPath: string, body: unknown) => send<T>(urlPath, { method: 'POST', body: JSON.stringify(body) }),
    delete: <T>(urlPath: string) => send<T>(urlPath, { method: 'DELETE' }),
  };
}
