export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export {
  InvalidFormatError,
  KeyNotFoundError,
  MissingFieldsError,
  NotFoundError,
  OutOfRangeError,
  UnsupportedFormatError,
} from "./core/errors"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
