export { validateConfig } from './validator';
export { addError, addWarning, checkRange, checkNotBlank, checkHttpUrl } from './helpers';
export type {
  ConfigField,
  NumericField,
  TextField,
  NumericLimits,
  ValidationError,
  ValidationWarning,
  ValidationIssues,
  ValidationResult
} from './types';
