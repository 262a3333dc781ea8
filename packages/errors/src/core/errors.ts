import { BaseError } from "./base-error"

/** A file, directory or environment variable that was expected to exist does not. */
export class NotFoundError extends BaseError<"not_found"> {
  constructor(
    readonly target: string,
    message: string = `${target} not found.`,
  ) {
    super(message, { code: "not_found", context: { target } })
  }
}

/** A file whose extension or content is not the expected document format. */
export class UnsupportedFormatError extends BaseError<"unsupported_format"> {
  constructor(file: string, reason: string, cause?: unknown) {
    super(`${file} ${reason}`, {
      code: "unsupported_format",
      context: { file, reason },
      cause,
    })
  }
}

export class KeyNotFoundError extends BaseError<"key_not_found"> {
  constructor(
    readonly key: string,
    where: string,
  ) {
    super(`${key} not found as key in ${where}.`, {
      code: "key_not_found",
      context: { key, where },
    })
  }
}

/**
 * A record lacks one or more required keys.
 *
 * @remarks
 * Every missing key is reported at once, in `missing` and in the message.
 */
export class MissingFieldsError extends BaseError<"missing_fields"> {
  readonly missing: readonly string[]

  constructor(missing: readonly string[], recordName?: string) {
    const suffix = recordName ? ` in ${recordName}.` : "."

    super(`missing keys ${missing.join(", ")}${suffix}`, {
      code: "missing_fields",
      context: { missing: [...missing], ...(recordName !== undefined && { recordName }) },
    })
    this.missing = Object.freeze([...missing])
  }
}

/** A value could not be parsed as the expected type. */
export class InvalidFormatError extends BaseError<"invalid_format"> {
  constructor(message: string, context: { expected: string; value?: unknown }) {
    super(message, { code: "invalid_format", context })
  }
}

export class OutOfRangeError extends BaseError<"out_of_range"> {
  constructor(message: string, context: { value: string; min: string }) {
    super(message, { code: "out_of_range", context })
  }
}
