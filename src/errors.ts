/**
 * Location of a value inside a JSON document, outermost segment first
 */
export type JsonPath = readonly (string | number)[]

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

/**
 * Format a path as `$.items[0].name`
 */
export function formatPath(path: JsonPath): string {
  let out = "$"
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`
    } else if (IDENTIFIER.test(segment)) {
      out += `.${segment}`
    } else {
      out += `[${JSON.stringify(segment)}]`
    }
  }
  return out
}

/**
 * Error thrown when a value does not match its declared schema, or when a schema
 * declaration itself is invalid.
 *
 * Binding fails fast: the partially populated destination is not rolled back.
 */
export class BindingError extends Error {
  /** The name of the error class */
  override name = "BindingError" as const

  /** The underlying error, if any */
  public override readonly cause: unknown

  /** The message without the path suffix */
  public readonly reason: string

  /** Where in the document binding failed; empty for schema construction failures */
  public readonly path: JsonPath

  constructor(options: { message: string; path?: JsonPath; cause?: unknown }) {
    const path = options.path ?? []
    super(path.length > 0 ? `${options.message} (at ${formatPath(path)})` : options.message)
    this.reason = options.message
    this.path = path
    this.cause = options.cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BindingError)
    }
  }

  /**
   * Copy of this error located one level deeper, under `segment`
   */
  within(segment: string | number): BindingError {
    return new BindingError({ message: this.reason, path: [segment, ...this.path], cause: this.cause })
  }

  /**
   * Create a BindingError from an unknown error value
   */
  static from(err: unknown): BindingError {
    if (err instanceof BindingError) {
      return err
    }

    if (err instanceof Error) {
      return new BindingError({ message: err.message, cause: err })
    }

    return new BindingError({ message: String(err), cause: err })
  }
}

/**
 * Error thrown by a token stream when its input is not well-formed JSON.
 * Malformed input is never recovered from.
 */
export class JsonSyntaxError extends Error {
  override name = "JsonSyntaxError" as const

  /** 1-based line of the offending character */
  public readonly line: number

  /** 1-based column of the offending character */
  public readonly column: number

  constructor(options: { message: string; line: number; column: number }) {
    super(`${options.message} at line ${options.line}, column ${options.column}`)
    this.line = options.line
    this.column = options.column

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, JsonSyntaxError)
    }
  }
}
