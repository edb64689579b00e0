export { DomainError, ValidationError, type DomainErrorOptions } from './errors/index.js';
export {
  getErrorMessage,
  isErrorWithMessage,
  isPlainObject,
  wrapError,
} from './utils/type-guard-utils.js';
