/**
 * Error definitions for propkit
 * Provides structured error hierarchy for all settings operations
 */

/** Base error class for all propkit errors */
export class SettingsError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'SettingsError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SettingsError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a property key cannot be represented in a settings file */
export class InvalidKeyError extends SettingsError {
  public readonly key: string

  constructor(key: string, reason: string) {
    super(`Invalid property key ${JSON.stringify(key)}: ${reason}`, 'INVALID_KEY', {
      key,
      reason,
    })
    this.name = 'InvalidKeyError'
    this.key = key
  }
}

/** Error thrown when a property value cannot be represented in a settings file */
export class InvalidValueError extends SettingsError {
  public readonly key: string

  constructor(key: string, value: string, reason: string) {
    super(`Invalid value for property "${key}": ${reason}`, 'INVALID_VALUE', {
      key,
      value,
      reason,
    })
    this.name = 'InvalidValueError'
    this.key = key
  }
}

/** A single malformed line found while parsing */
export interface ParseIssue {
  /** 1-based line number */
  line: number
  text: string
  reason: string
}

/** Error thrown when settings text contains malformed lines */
export class ParseError extends SettingsError {
  public readonly issues: readonly ParseIssue[]

  constructor(issues: ParseIssue[], context: Record<string, unknown> = {}) {
    const details = issues
      .map((issue) => `  • line ${String(issue.line)}: ${issue.reason}`)
      .join('\n')
    const noun = issues.length === 1 ? 'line' : 'lines'
    super(`Malformed settings text (${String(issues.length)} ${noun}):\n${details}`, 'PARSE_ERROR', {
      ...context,
      issues,
    })
    this.name = 'ParseError'
    this.issues = issues
  }
}

/** Filesystem operation that failed */
export type IoOperation = 'read' | 'write'

/** Error thrown when a settings file cannot be read or written */
export class SettingsIoError extends SettingsError {
  public readonly path: string
  public readonly operation: IoOperation
  /** OS error code (ENOENT, EACCES, ...) when available */
  public readonly osCode: string | undefined

  constructor(path: string, operation: IoOperation, cause: unknown) {
    const osCode = errorCode(cause)
    const message = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to ${operation} settings file at ${path}: ${message}`, 'IO_ERROR', {
      path,
      operation,
      osCode,
    }, { cause })
    this.name = 'SettingsIoError'
    this.path = path
    this.operation = operation
    this.osCode = osCode
  }
}

function errorCode(err: unknown): string | undefined {
  if (err !== null && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}
