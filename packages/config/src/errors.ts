import type { z } from 'zod'

export interface ConfigIssue {
  /** Dotted field path, empty for the root value. */
  path: string
  message: string
}

/** Error when a configuration value fails schema validation. */
export class ConfigValidationError extends Error {
  constructor(
    public readonly subject: string,
    public readonly issues: ConfigIssue[],
  ) {
    super(
      `Invalid ${subject}: ` +
        issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; '),
    )
    this.name = 'ConfigValidationError'
  }

  static fromZod(subject: string, error: z.ZodError): ConfigValidationError {
    return new ConfigValidationError(
      subject,
      error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    )
  }
}

/** Error when a dependency name is added to a descriptor twice. */
export class DuplicateDependencyError extends Error {
  constructor(public readonly dependency: string) {
    super(`Dependency already declared: ${dependency}`)
    this.name = 'DuplicateDependencyError'
  }
}
