/** Best-effort one-line description of a thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name
  if (typeof err === "string") return err

  try {
    return JSON.stringify(err) ?? String(err)
  } catch {
    return String(err)
  }
}
