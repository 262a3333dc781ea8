import {
  InvalidFormatError,
  KeyNotFoundError,
  MissingFieldsError,
  NotFoundError,
  OutOfRangeError,
  UnsupportedFormatError,
} from "../errors"

describe("error taxonomy", () => {
  it("NotFoundError names its target", () => {
    const err = new NotFoundError("/etc/app/config.json")

    expect(err.code).toBe("not_found")
    expect(err.message).toBe("/etc/app/config.json not found.")
    expect(err.target).toBe("/etc/app/config.json")
    expect(err.context).toEqual({ target: "/etc/app/config.json" })
  })

  it("NotFoundError accepts a custom message", () => {
    const err = new NotFoundError("APP_ID", "APP_ID not found in environment variables.")

    expect(err.message).toBe("APP_ID not found in environment variables.")
  })

  it("UnsupportedFormatError keeps reason and cause", () => {
    const cause = new SyntaxError("bad json")
    const err = new UnsupportedFormatError("config.yaml", "must be a .json file.", cause)

    expect(err.code).toBe("unsupported_format")
    expect(err.message).toBe("config.yaml must be a .json file.")
    expect(err.context).toEqual({ file: "config.yaml", reason: "must be a .json file." })
    expect(err.cause).toBe(cause)
  })

  it("KeyNotFoundError names the key and where it was looked up", () => {
    const err = new KeyNotFoundError("3fa85f64-5717-4562-b3fc-2c963f66afa6", "config.json")

    expect(err.code).toBe("key_not_found")
    expect(err.message).toBe(
      "3fa85f64-5717-4562-b3fc-2c963f66afa6 not found as key in config.json.",
    )
  })

  describe("MissingFieldsError", () => {
    it("lists every missing key with the record name", () => {
      const err = new MissingFieldsError(["host", "port"], "config")

      expect(err.code).toBe("missing_fields")
      expect(err.message).toBe("missing keys host, port in config.")
      expect(err.missing).toEqual(["host", "port"])
      expect(err.context).toEqual({ missing: ["host", "port"], recordName: "config" })
    })

    it("ends with a period when no record name is given", () => {
      const err = new MissingFieldsError(["host"])

      expect(err.message).toBe("missing keys host.")
      expect(err.context).toEqual({ missing: ["host"] })
    })

    it("does not share the caller's array", () => {
      const missing = ["host"]
      const err = new MissingFieldsError(missing)

      missing.push("port")

      expect(err.missing).toEqual(["host"])
      expect(Object.isFrozen(err.missing)).toBe(true)
    })
  })

  it("InvalidFormatError carries expected type and value", () => {
    const err = new InvalidFormatError("not a uuid", { expected: "uuid", value: "abc" })

    expect(err.code).toBe("invalid_format")
    expect(err.context).toEqual({ expected: "uuid", value: "abc" })
  })

  it("OutOfRangeError carries value and minimum", () => {
    const err = new OutOfRangeError("negative", { value: "-1", min: "0" })

    expect(err.code).toBe("out_of_range")
    expect(err.context).toEqual({ value: "-1", min: "0" })
  })
})
