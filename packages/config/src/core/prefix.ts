/**
 * Keep only `prefix`-ed keys and strip the prefix. No prefix keeps everything.
 */
export function stripPrefix(
  values: Readonly<Record<string, string | undefined>>,
  prefix: string | undefined,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const out: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      out[key.slice(prefix.length)] = value
    }
  }

  return out
}
