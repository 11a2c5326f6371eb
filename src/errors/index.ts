/**
 * Error Module
 *
 * Error factories, the ProtoError type, and error code definitions.
 */

export { Errors, type OptionIssue } from './factories.js'
export { ProtoError } from './proto-error.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getStatusForCode,
  isClientError,
} from './codes.js'
