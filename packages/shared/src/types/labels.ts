/**
 * Labels and equality label selectors (Kubernetes-like)
 * @module @prepuller/shared/types/labels
 */

/**
 * Labels are key-value pairs attached to nodes and used for selection
 *
 * @example
 * {
 *   "jupyterlab": "ok",
 *   "node.kubernetes.io/instance-type": "n2-standard-8"
 * }
 */
export type Labels = Record<string, string>;

/**
 * Check if labels match simple key-value requirements.
 * An empty requirement set matches every node.
 */
export function matchesLabels(labels: Readonly<Labels>, required: Readonly<Labels>): boolean {
  for (const [key, value] of Object.entries(required)) {
    if (labels[key] !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Canonical string form of a selector: keys sorted, `k=v` joined by commas.
 * Two selectors with the same pairs produce the same key.
 */
export function selectorKey(selector: Readonly<Labels>): string {
  return Object.keys(selector)
    .sort()
    .map((key) => `${key}=${selector[key]}`)
    .join(',');
}

/**
 * Format a selector for display, `<all nodes>` when empty
 */
export function formatLabelSelector(selector: Readonly<Labels>): string {
  const key = selectorKey(selector);
  return key === '' ? '<all nodes>' : key;
}

/**
 * Parse `k=v,k2=v2` into labels
 *
 * @throws {Error} When a pair has no `=` or an empty key
 */
export function parseLabelSelector(input: string): Labels {
  const labels: Labels = {};
  const trimmed = input.trim();
  if (trimmed === '') {
    return labels;
  }

  for (const pair of trimmed.split(',')) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new Error(`Invalid label selector entry "${pair}", expected key=value`);
    }
    const key = pair.slice(0, index).trim();
    const value = pair.slice(index + 1).trim();
    if (key === '') {
      throw new Error(`Invalid label selector entry "${pair}", expected key=value`);
    }
    labels[key] = value;
  }

  return labels;
}

/**
 * Validate a label key
 * - Must be non-empty
 * - Must start with alphanumeric
 * - Can contain alphanumeric, dash, underscore, dot
 * - Optional prefix (DNS subdomain) followed by /
 */
export function isValidLabelKey(key: string): boolean {
  if (!key || key.length > 253) {
    return false;
  }

  const parts = key.split('/');
  if (parts.length > 2) {
    return false;
  }

  const name = parts.length === 2 ? parts[1] : parts[0];

  // Name must be 1-63 characters
  if (!name || name.length > 63) {
    return false;
  }

  if (!/^[a-zA-Z0-9]/.test(name) || !/[a-zA-Z0-9]$/.test(name)) {
    return false;
  }

  return /^[a-zA-Z0-9._-]*$/.test(name);
}

/**
 * Validate a label value
 * - Can be empty
 * - Must be 63 characters or less
 * - If non-empty, must start and end with alphanumeric
 * - Can contain alphanumeric, dash, underscore, dot
 */
export function isValidLabelValue(value: string): boolean {
  if (value.length > 63) {
    return false;
  }

  if (value === '') {
    return true;
  }

  if (!/^[a-zA-Z0-9]/.test(value) || !/[a-zA-Z0-9]$/.test(value)) {
    return false;
  }

  return /^[a-zA-Z0-9._-]*$/.test(value);
}

/**
 * Validate all labels in a set
 */
export function validateLabels(labels: Readonly<Labels>): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const [key, value] of Object.entries(labels)) {
    if (!isValidLabelKey(key)) {
      errors.push(`Invalid label key: "${key}"`);
    }
    if (!isValidLabelValue(value)) {
      errors.push(`Invalid label value for key "${key}": "${value}"`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
