export { BaseError, REDACTED, serializeError } from "./core/base-error"
export type { BaseErrorOptions, SerializeOptions } from "./core/base-error"
export { describeError, errorChain } from "./core/utils/error-chain"
export { hasErrorCode, isAppError } from "./core/utils/is-app-error"
export { toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
