export function isAlreadyExistsError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST"
}

/** `ENOENT` (nothing there) or `ENOTDIR` (a parent is a file). */
export function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
}
