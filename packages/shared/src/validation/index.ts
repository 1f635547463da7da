/**
 * Validation module - re-exports all validators
 * @module @prepuller/shared/validation
 */

// Types
export type { ValidationResult, ValidationError } from './policy-validation';

// Policy validation
export {
  MAX_POLICY_NAME_LENGTH,
  validatePolicyName,
  validateLabelSelector,
  validatePinnedListConfig,
  validateTagClassifyingConfig,
  validateStrategyConfig,
  validateCachePolicyInput,
  toConfigErrorDetails,
  parseCachePolicySpec,
} from './policy-validation';
