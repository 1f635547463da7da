/**
 * Cache policy validation
 * @module @prepuller/shared/validation/policy-validation
 */

import { ConfigError, type ConfigErrorDetail } from '../errors/config-error';
import { ErrorCode } from '../errors/base-error';
import { isValidLabelKey, isValidLabelValue, type Labels } from '../types/labels';
import { parseImageReference } from '../types/images';
import {
  STRATEGY_TYPES,
  type CachePolicySpec,
  type PinnedImage,
  type PinnedListStrategyConfig,
  type StrategyConfig,
  type TagClassifyingStrategyConfig,
} from '../types/policy';

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Single validation error
 */
export interface ValidationError {
  field: string;
  message: string;
  code: string;
}

/**
 * Policy names end up in workload names and label values, so they follow
 * DNS-1123 label rules with room left for the workload suffix.
 */
const POLICY_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

/**
 * Maximum policy name length
 */
export const MAX_POLICY_NAME_LENGTH = 40;

/**
 * Repository path: lowercase components separated by `/`
 */
const REPOSITORY_PATTERN = /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/;

/**
 * Registry host with optional port
 */
const REGISTRY_HOST_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9.-]*[a-zA-Z0-9])?(:\d{1,5})?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Validate policy name
 */
export function validatePolicyName(name: unknown): ValidationError | null {
  if (name === undefined || name === null) {
    return { field: 'name', message: 'Policy name is required', code: 'REQUIRED' };
  }

  if (typeof name !== 'string') {
    return { field: 'name', message: 'Policy name must be a string', code: 'INVALID_TYPE' };
  }

  if (name.length === 0) {
    return { field: 'name', message: 'Policy name cannot be empty', code: 'EMPTY' };
  }

  if (name.length > MAX_POLICY_NAME_LENGTH) {
    return {
      field: 'name',
      message: `Policy name must be ${MAX_POLICY_NAME_LENGTH} characters or less`,
      code: 'TOO_LONG',
    };
  }

  if (!POLICY_NAME_PATTERN.test(name)) {
    return {
      field: 'name',
      message: 'Policy name must consist of lowercase alphanumerics and hyphens, starting and ending with an alphanumeric',
      code: 'INVALID_FORMAT',
    };
  }

  return null;
}

/**
 * Validate an equality label selector
 */
export function validateLabelSelector(selector: unknown, field = 'labelSelector'): ValidationError[] {
  if (selector === undefined || selector === null) {
    return [{ field, message: 'Label selector is required', code: 'REQUIRED' }];
  }

  if (!isRecord(selector)) {
    return [{ field, message: 'Label selector must be an object of key/value pairs', code: 'INVALID_TYPE' }];
  }

  const errors: ValidationError[] = [];
  for (const [key, value] of Object.entries(selector)) {
    if (!isValidLabelKey(key)) {
      errors.push({ field: `${field}.${key}`, message: `Invalid label key: "${key}"`, code: 'INVALID_FORMAT' });
    }
    if (typeof value !== 'string') {
      errors.push({ field: `${field}.${key}`, message: 'Label value must be a string', code: 'INVALID_TYPE' });
    } else if (!isValidLabelValue(value)) {
      errors.push({ field: `${field}.${key}`, message: `Invalid label value: "${value}"`, code: 'INVALID_FORMAT' });
    }
  }
  return errors;
}

/**
 * Validate a pinned list strategy body
 */
export function validatePinnedListConfig(config: Record<string, unknown>, field: string): ValidationError[] {
  const images = config.images;
  if (images === undefined || images === null) {
    return [{ field: `${field}.images`, message: 'Image list is required', code: 'REQUIRED' }];
  }
  if (!Array.isArray(images)) {
    return [{ field: `${field}.images`, message: 'Image list must be an array', code: 'INVALID_TYPE' }];
  }

  const errors: ValidationError[] = [];
  images.forEach((entry: unknown, index) => {
    const entryField = `${field}.images[${index}]`;
    if (!isRecord(entry)) {
      errors.push({ field: entryField, message: 'Image entry must be an object', code: 'INVALID_TYPE' });
      return;
    }
    if (typeof entry.name !== 'string' || entry.name.trim() === '') {
      errors.push({ field: `${entryField}.name`, message: 'Image name must be a non-empty string', code: 'REQUIRED' });
    }
    if (typeof entry.imageUrl !== 'string' || entry.imageUrl.trim() === '') {
      errors.push({ field: `${entryField}.imageUrl`, message: 'Image URL must be a non-empty string', code: 'REQUIRED' });
    } else {
      try {
        parseImageReference(entry.imageUrl);
      } catch {
        errors.push({ field: `${entryField}.imageUrl`, message: `Invalid image reference: "${entry.imageUrl}"`, code: 'INVALID_FORMAT' });
      }
    }
  });
  return errors;
}

/**
 * Validate a tag classifying strategy body
 */
export function validateTagClassifyingConfig(config: Record<string, unknown>, field: string): ValidationError[] {
  const errors: ValidationError[] = [];

  if (typeof config.repo !== 'string' || config.repo === '') {
    errors.push({ field: `${field}.repo`, message: 'Repository is required', code: 'REQUIRED' });
  } else if (!REPOSITORY_PATTERN.test(config.repo)) {
    errors.push({ field: `${field}.repo`, message: `Invalid repository: "${config.repo}"`, code: 'INVALID_FORMAT' });
  }

  if (config.registryUrl !== undefined) {
    if (typeof config.registryUrl !== 'string' || !REGISTRY_HOST_PATTERN.test(config.registryUrl)) {
      errors.push({ field: `${field}.registryUrl`, message: 'Registry URL must be a host name with optional port', code: 'INVALID_FORMAT' });
    }
  }

  if (config.recommendedTag !== undefined) {
    if (typeof config.recommendedTag !== 'string' || config.recommendedTag === '') {
      errors.push({ field: `${field}.recommendedTag`, message: 'Recommended tag must be a non-empty string', code: 'INVALID_TYPE' });
    }
  }

  for (const key of ['numReleases', 'numWeeklies', 'numDailies'] as const) {
    const value = config[key];
    if (value === undefined || value === null) {
      errors.push({ field: `${field}.${key}`, message: `${key} is required`, code: 'REQUIRED' });
    } else if (!isNonNegativeInteger(value)) {
      errors.push({ field: `${field}.${key}`, message: `${key} must be a non-negative integer`, code: 'OUT_OF_RANGE' });
    }
  }

  if (config.cycle !== undefined && !isNonNegativeInteger(config.cycle)) {
    errors.push({ field: `${field}.cycle`, message: 'Cycle must be a non-negative integer', code: 'OUT_OF_RANGE' });
  }

  if (config.aliasTags !== undefined) {
    if (!Array.isArray(config.aliasTags)) {
      errors.push({ field: `${field}.aliasTags`, message: 'Alias tags must be an array of strings', code: 'INVALID_TYPE' });
    } else {
      config.aliasTags.forEach((tag: unknown, index) => {
        if (typeof tag !== 'string' || tag === '') {
          errors.push({ field: `${field}.aliasTags[${index}]`, message: 'Alias tag must be a non-empty string', code: 'INVALID_TYPE' });
        }
      });
    }
  }

  return errors;
}

/**
 * Validate one strategy configuration
 */
export function validateStrategyConfig(config: unknown, index: number): ValidationError[] {
  const field = `strategies[${index}]`;
  if (!isRecord(config)) {
    return [{ field, message: 'Strategy must be an object', code: 'INVALID_TYPE' }];
  }

  switch (config.type) {
    case 'PinnedListStrategy':
      return validatePinnedListConfig(config, field);
    case 'TagClassifyingStrategy':
      return validateTagClassifyingConfig(config, field);
    case undefined:
      return [{ field: `${field}.type`, message: 'Strategy type is required', code: 'REQUIRED' }];
    default:
      return [{
        field: `${field}.type`,
        message: `Unknown strategy type "${String(config.type)}"; expected one of ${STRATEGY_TYPES.join(', ')}`,
        code: 'UNKNOWN_STRATEGY',
      }];
  }
}

/**
 * Validate cache policy creation input
 */
export function validateCachePolicyInput(input: unknown): ValidationResult {
  if (input === undefined || input === null) {
    return {
      valid: false,
      errors: [{ field: 'input', message: 'Input is required', code: 'REQUIRED' }],
    };
  }

  if (!isRecord(input)) {
    return {
      valid: false,
      errors: [{ field: 'input', message: 'Input must be an object', code: 'INVALID_TYPE' }],
    };
  }

  const errors: ValidationError[] = [];

  const nameError = validatePolicyName(input.name);
  if (nameError) errors.push(nameError);

  errors.push(...validateLabelSelector(input.labelSelector));

  const strategies = input.strategies;
  if (strategies === undefined || strategies === null) {
    errors.push({ field: 'strategies', message: 'At least one strategy is required', code: 'REQUIRED' });
  } else if (!Array.isArray(strategies)) {
    errors.push({ field: 'strategies', message: 'Strategies must be an array', code: 'INVALID_TYPE' });
  } else if (strategies.length === 0) {
    errors.push({ field: 'strategies', message: 'At least one strategy is required', code: 'EMPTY' });
  } else {
    strategies.forEach((strategy: unknown, index) => {
      errors.push(...validateStrategyConfig(strategy, index));
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

function toLabels(raw: unknown): Labels {
  const labels: Labels = {};
  if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string') {
        labels[key] = value;
      }
    }
  }
  return labels;
}

function toPinnedListConfig(raw: Record<string, unknown>): PinnedListStrategyConfig {
  const images: PinnedImage[] = [];
  if (Array.isArray(raw.images)) {
    for (const entry of raw.images) {
      if (isRecord(entry) && typeof entry.name === 'string' && typeof entry.imageUrl === 'string') {
        images.push({ name: entry.name, imageUrl: entry.imageUrl.trim() });
      }
    }
  }
  return { type: 'PinnedListStrategy', images };
}

function toTagClassifyingConfig(raw: Record<string, unknown>): TagClassifyingStrategyConfig {
  const config: TagClassifyingStrategyConfig = {
    type: 'TagClassifyingStrategy',
    repo: typeof raw.repo === 'string' ? raw.repo : '',
    numReleases: isNonNegativeInteger(raw.numReleases) ? raw.numReleases : 0,
    numWeeklies: isNonNegativeInteger(raw.numWeeklies) ? raw.numWeeklies : 0,
    numDailies: isNonNegativeInteger(raw.numDailies) ? raw.numDailies : 0,
  };
  if (typeof raw.registryUrl === 'string') {
    config.registryUrl = raw.registryUrl;
  }
  if (typeof raw.recommendedTag === 'string') {
    config.recommendedTag = raw.recommendedTag;
  }
  if (isNonNegativeInteger(raw.cycle)) {
    config.cycle = raw.cycle;
  }
  if (Array.isArray(raw.aliasTags)) {
    config.aliasTags = raw.aliasTags.filter((tag: unknown): tag is string => typeof tag === 'string');
  }
  return config;
}

function toStrategyConfig(raw: unknown): StrategyConfig | null {
  if (!isRecord(raw)) {
    return null;
  }
  if (raw.type === 'PinnedListStrategy') {
    return toPinnedListConfig(raw);
  }
  if (raw.type === 'TagClassifyingStrategy') {
    return toTagClassifyingConfig(raw);
  }
  return null;
}

/**
 * Convert validation errors to config error details
 */
export function toConfigErrorDetails(errors: ValidationError[]): ConfigErrorDetail[] {
  return errors.map((e) => ({ field: e.field, message: e.message, rule: e.code }));
}

/**
 * Validate untrusted input and build a typed policy spec
 *
 * @throws {ConfigError} With one detail per invalid field
 */
export function parseCachePolicySpec(input: unknown): CachePolicySpec {
  const result = validateCachePolicyInput(input);
  if (!result.valid || !isRecord(input)) {
    const details = toConfigErrorDetails(result.errors);
    const unknownStrategyOnly = result.errors.length > 0 &&
      result.errors.every((e) => e.code === 'UNKNOWN_STRATEGY');
    const error = ConfigError.multiple(details);
    if (unknownStrategyOnly) {
      throw new ConfigError(error.message, details, ErrorCode.UNKNOWN_STRATEGY);
    }
    throw error;
  }

  const strategies: StrategyConfig[] = [];
  if (Array.isArray(input.strategies)) {
    for (const raw of input.strategies) {
      const config = toStrategyConfig(raw);
      if (config) {
        strategies.push(config);
      }
    }
  }

  return {
    name: typeof input.name === 'string' ? input.name : '',
    labelSelector: toLabels(input.labelSelector),
    strategies,
  };
}
