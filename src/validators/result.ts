import { z } from 'zod'
import { ValidationError } from '../utils/errors'

export interface ValidationIssue {
  path: string
  message: string
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: ValidationIssue[] }

export const validate = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): ValidationResult<z.infer<S>> => {
  const parsed = schema.safeParse(input)
  if (parsed.success) {
    return { ok: true, value: parsed.data }
  }
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  }
}

/** Unwrap at the service boundary: a failed result becomes a 400. */
export const unwrap = <T>(result: ValidationResult<T>, entity: string): T => {
  if (result.ok) return result.value
  const summary = result.issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ')
  throw new ValidationError(`Invalid ${entity}: ${summary}`, result.issues)
}

export const hasFields = (value: object): boolean =>
  Object.values(value).some((field) => field !== undefined)
