/**
 * Structural JSON tokens shared by every token stream backend and every sink
 */
export type JsonToken =
  | "START_OBJECT"
  | "END_OBJECT"
  | "START_ARRAY"
  | "END_ARRAY"
  | "FIELD_NAME"
  | "VALUE_STRING"
  | "VALUE_NUMBER_INT"
  | "VALUE_NUMBER_FLOAT"
  | "VALUE_TRUE"
  | "VALUE_FALSE"
  | "VALUE_NULL"

/**
 * Pull-based stream of JSON tokens.
 *
 * A stream starts before its first token (`currentToken` is undefined). Each call to
 * `nextToken()` advances by exactly one token; `undefined` means end of input.
 */
export interface TokenStream {
  /** The token the stream is positioned on */
  readonly currentToken: JsonToken | undefined
  /** Name of the innermost field, set while positioned on a FIELD_NAME or on its value */
  readonly currentName: string | undefined
  /** Text of the current token: the field name, the unescaped string, or the literal number text */
  readonly text: string
  /** Advance to the next token */
  nextToken(): JsonToken | undefined
  /**
   * When positioned on START_OBJECT or START_ARRAY, advance to the matching end token.
   * Does nothing on any other token.
   */
  skipChildren(): void
  /** Release the underlying source */
  close(): void
}

/**
 * Receiver of generated tokens
 */
export interface TokenSink {
  writeStartObject(): void
  writeEndObject(): void
  writeStartArray(): void
  writeEndArray(): void
  writeFieldName(name: string): void
  writeNull(): void
  writeString(value: string): void
  writeBoolean(value: boolean): void
  /** Write an already-encoded JSON number literal */
  writeNumber(literal: string): void
  flush(): void
}

export const isScalarToken = (token: JsonToken | undefined): boolean =>
  token === "VALUE_STRING" ||
  token === "VALUE_NUMBER_INT" ||
  token === "VALUE_NUMBER_FLOAT" ||
  token === "VALUE_TRUE" ||
  token === "VALUE_FALSE" ||
  token === "VALUE_NULL"
