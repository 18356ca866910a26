export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
export { BaseError, serializeError } from "./core/base-error"
export type { BaseErrorOptions, SerializeOptions } from "./core/base-error"
export { errorChain } from "./core/utils/error-chain"
export { isAppError } from "./core/utils/is-app-error"
export { toAppError } from "./core/utils/to-app-error"
