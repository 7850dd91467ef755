import type { JsonToken, TokenSink, TokenStream } from "@/tokens/types"

/**
 * A recorded token together with its text
 */
export type RecordedToken = {
  token: JsonToken
  text: string
}

const TOKEN_TEXT: Partial<Record<JsonToken, string>> = {
  START_OBJECT: "{",
  END_OBJECT: "}",
  START_ARRAY: "[",
  END_ARRAY: "]",
  VALUE_TRUE: "true",
  VALUE_FALSE: "false",
  VALUE_NULL: "null",
}

/**
 * Sink that records tokens in memory so they can be replayed later as a token stream.
 *
 * Used to hold object members whose target schema is not known yet, and as a
 * generator target when the output is consumed by another binder.
 */
export class TokenBuffer implements TokenSink {
  #tokens: RecordedToken[] = []

  get tokens(): readonly RecordedToken[] {
    return this.#tokens
  }

  get size(): number {
    return this.#tokens.length
  }

  append(token: JsonToken, text: string = TOKEN_TEXT[token] ?? ""): void {
    this.#tokens.push({ token, text })
  }

  writeStartObject(): void {
    this.append("START_OBJECT")
  }

  writeEndObject(): void {
    this.append("END_OBJECT")
  }

  writeStartArray(): void {
    this.append("START_ARRAY")
  }

  writeEndArray(): void {
    this.append("END_ARRAY")
  }

  writeFieldName(name: string): void {
    this.append("FIELD_NAME", name)
  }

  writeNull(): void {
    this.append("VALUE_NULL")
  }

  writeString(value: string): void {
    this.append("VALUE_STRING", value)
  }

  writeBoolean(value: boolean): void {
    this.append(value ? "VALUE_TRUE" : "VALUE_FALSE")
  }

  writeNumber(literal: string): void {
    this.append(/[.eE]/.test(literal) ? "VALUE_NUMBER_FLOAT" : "VALUE_NUMBER_INT", literal)
  }

  flush(): void {}

  /**
   * Record the token the stream is positioned on and, for an object or array, every token up to
   * its matching end. The stream is left on the last recorded token.
   */
  copyCurrentStructure(stream: TokenStream): void {
    const first = stream.currentToken
    if (first === undefined) return

    this.append(first, stream.text)
    if (first !== "START_OBJECT" && first !== "START_ARRAY") return

    let depth = 1
    while (depth > 0) {
      const token = stream.nextToken()
      if (token === undefined) return
      this.append(token, stream.text)
      if (token === "START_OBJECT" || token === "START_ARRAY") depth++
      else if (token === "END_OBJECT" || token === "END_ARRAY") depth--
    }
  }

  /**
   * Replay the recorded tokens from the beginning
   */
  asTokenStream(): BufferedTokenStream {
    return new BufferedTokenStream(this.#tokens)
  }
}

/**
 * Token stream over tokens recorded by a {@link TokenBuffer}
 */
export class BufferedTokenStream implements TokenStream {
  #tokens: readonly RecordedToken[]
  #index: number = -1
  #names: (string | undefined)[] = []
  #name: string | undefined = undefined

  constructor(tokens: readonly RecordedToken[]) {
    this.#tokens = tokens
  }

  get currentToken(): JsonToken | undefined {
    return this.#tokens[this.#index]?.token
  }

  get currentName(): string | undefined {
    return this.#name
  }

  get text(): string {
    return this.#tokens[this.#index]?.text ?? ""
  }

  nextToken(): JsonToken | undefined {
    if (this.#index < this.#tokens.length) this.#index++

    const current = this.#tokens[this.#index]
    if (!current) return undefined

    switch (current.token) {
      case "START_OBJECT":
      case "START_ARRAY":
        this.#names.push(this.#name)
        break
      case "END_OBJECT":
      case "END_ARRAY":
        this.#name = this.#names.pop()
        break
      case "FIELD_NAME":
        this.#name = current.text
        break
    }

    return current.token
  }

  skipChildren(): void {
    const token = this.currentToken
    if (token !== "START_OBJECT" && token !== "START_ARRAY") return

    let depth = 1
    while (depth > 0) {
      const next = this.nextToken()
      if (next === undefined) return
      if (next === "START_OBJECT" || next === "START_ARRAY") depth++
      else if (next === "END_OBJECT" || next === "END_ARRAY") depth--
    }
  }

  close(): void {
    this.#index = this.#tokens.length
  }
}
