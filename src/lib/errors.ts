import { NextResponse } from 'next/server'

export type ValidationErrors = Record<string, string[]>

export class HttpError extends Error {
  status: number
  code: string

  constructor(message: string, status: number, code?: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.code = code || `HTTP_${status}`
  }
}

export class RecordNotFound extends HttpError {
  constructor(message = 'Not found') {
    super(message, 404, 'NOT_FOUND')
    this.name = 'RecordNotFound'
  }
}

export class ServiceUnavailable extends HttpError {
  constructor(message = 'Service unavailable') {
    super(message, 503, 'SERVICE_UNAVAILABLE')
    this.name = 'ServiceUnavailable'
  }
}

export class ValidationFailed extends HttpError {
  errors: ValidationErrors

  constructor(errors: ValidationErrors) {
    super('Validation failed', 422, 'VALIDATION_FAILED')
    this.name = 'ValidationFailed'
    this.errors = errors
  }
}

export class InvalidTransition extends HttpError {
  constructor(message: string) {
    super(message, 422, 'INVALID_TRANSITION')
    this.name = 'InvalidTransition'
  }
}

/**
 * Map a thrown error to a JSON response. Unknown errors are logged and answered with 500.
 */
export function errorResponse(error: unknown, failure: string): NextResponse {
  if (error instanceof ValidationFailed) {
    return NextResponse.json({ error: error.message, code: error.code, errors: error.errors }, { status: error.status })
  }
  if (error instanceof HttpError) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.status })
  }

  console.error(`${failure}:`, error)
  return NextResponse.json({ error: failure }, { status: 500 })
}
