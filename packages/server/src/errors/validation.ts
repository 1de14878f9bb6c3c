import { BaseError } from "@durable-links/errors"
import type { z } from "zod/mini"

export type ValidationIssue = { path: string; message: string }

type ZodIssueLike = {
  path: readonly PropertyKey[]
  message: string
}

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

/** Request input that failed its schema. `context.issues` lists every problem. */
export class ValidationError extends BaseError<"validation_error"> {
  static fromIssues(raw: readonly ZodIssueLike[]): ValidationError {
    const issues = raw.map((i) => ({ path: formatPath(i.path), message: i.message }))

    return new ValidationError(issues[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues },
    })
  }
}

/** Parses with a zod/mini schema, turning failures into a ValidationError. */
export function parseOrThrow<S extends z.ZodMiniType>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data)

  if (!result.success) throw ValidationError.fromIssues(result.error.issues)

  return result.data
}
