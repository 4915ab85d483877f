import { ZodError } from 'zod'

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly validationErrors: ZodError['issues'],
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }

  /**
   * Returns a human-readable summary of all validation errors
   */
  getErrorSummary(): string {
    return this.validationErrors
      .map((issue) => {
        const path = issue.path.map(String).join('.')
        return `${path ? `${path}: ` : ''}${issue.message}`
      })
      .join('\n')
  }
}

export class ConfigLoadError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ConfigLoadError'
  }
}
