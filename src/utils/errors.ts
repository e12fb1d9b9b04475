/**
 * Operation-boundary errors. `statusCode` is what the Express error handler
 * renders; anything without one is treated as an infrastructure failure (500).
 */
export class AppError extends Error {
  readonly statusCode: number
  readonly details?: unknown

  constructor(message: string, statusCode: number, details?: unknown) {
    super(message)
    this.name = new.target.name
    this.statusCode = statusCode
    this.details = details
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, details)
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401)
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404)
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409)
  }
}

// Mongo duplicate key
export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 11000
