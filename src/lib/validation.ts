import { ValidationFailed, type ValidationErrors } from './errors'

export const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/

/**
 * Collects field errors; `assertValid` throws a ValidationFailed when any were added.
 */
export class Validator {
  readonly errors: ValidationErrors = {}

  add(field: string, message: string) {
    ;(this.errors[field] ??= []).push(message)
  }

  get valid() {
    return Object.keys(this.errors).length === 0
  }

  presence(field: string, value: string | null | undefined) {
    if (value === null || value === undefined || value.trim() === '') {
      this.add(field, "can't be blank")
      return false
    }
    return true
  }

  maxLength(field: string, value: string | null | undefined, maximum: number) {
    if (value && value.length > maximum) {
      this.add(field, `is too long (maximum is ${maximum} characters)`)
    }
  }

  integer(field: string, value: unknown) {
    if (value === null || value === undefined || value === '') {
      this.add(field, "can't be blank")
    } else if (typeof value !== 'number' || Number.isNaN(value)) {
      this.add(field, 'is not a number')
    } else if (!Number.isInteger(value)) {
      this.add(field, 'must be an integer')
    }
  }

  email(field: string, value: string | null | undefined) {
    if (this.presence(field, value) && value && !EMAIL_PATTERN.test(value.trim())) {
      this.add(field, 'is invalid')
    }
  }

  assertValid() {
    if (!this.valid) throw new ValidationFailed(this.errors)
  }
}
