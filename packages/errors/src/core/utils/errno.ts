/**
 * The `code` of a Node system error (`ENOENT`, `EEXIST`, ...), or `undefined`
 * for anything else.
 */
export function errnoCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined

  const code: unknown = Reflect.get(err, "code")

  return typeof code === "string" ? code : undefined
}

export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === "ENOENT"
}

export function isAlreadyExists(err: unknown): boolean {
  return errnoCode(err) === "EEXIST"
}
