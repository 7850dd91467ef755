import { JsonSyntaxError } from "@/errors"
import { TextDecoder } from "node:util"

/**
 * Anything a text token stream can read from. Iterables are pulled lazily, one chunk at a time,
 * so a source may be handed over before all of its bytes have arrived.
 */
export type JsonSource = string | Uint8Array | Iterable<string | Uint8Array>

/** Consumed characters kept before the buffer is compacted */
const COMPACT_THRESHOLD = 4096

/**
 * Character reader over a JSON source that tracks line and column for error reporting
 */
export class CharSource {
  #chunks: Iterator<string | Uint8Array> | null = null
  #decoder: TextDecoder
  #charset: string
  #buffer: string = ""
  #offset: number = 0
  #line: number = 1
  #column: number = 1

  constructor(source: JsonSource, charset: string = "utf-8") {
    this.#charset = charset
    this.#decoder = new TextDecoder(charset, { fatal: true })

    if (typeof source === "string") {
      this.#buffer = source
    } else if (source instanceof Uint8Array) {
      this.#buffer = this.#decode(source, false)
    } else {
      this.#chunks = source[Symbol.iterator]()
    }
  }

  get line(): number {
    return this.#line
  }

  get column(): number {
    return this.#column
  }

  /**
   * Look at the next character without consuming it
   */
  peek(): string | undefined {
    while (this.#offset >= this.#buffer.length) {
      if (!this.#pull()) return undefined
    }
    return this.#buffer[this.#offset]
  }

  /**
   * Consume and return the next character
   */
  next(): string | undefined {
    const char = this.peek()
    if (char === undefined) return undefined

    this.#offset++
    if (char === "\n") {
      this.#line++
      this.#column = 1
    } else {
      this.#column++
    }
    return char
  }

  /**
   * Drop the remaining input
   */
  close(): void {
    this.#chunks?.return?.()
    this.#chunks = null
    this.#buffer = ""
    this.#offset = 0
  }

  fail(message: string): never {
    throw new JsonSyntaxError({ message, line: this.#line, column: this.#column })
  }

  #pull(): boolean {
    if (!this.#chunks) return false

    const result = this.#chunks.next()
    if (this.#offset > COMPACT_THRESHOLD) {
      this.#buffer = this.#buffer.slice(this.#offset)
      this.#offset = 0
    }

    if (result.done) {
      this.#chunks = null
      // flush any partial multi-byte sequence left in the decoder
      this.#buffer += this.#decode(new Uint8Array(0), false)
      return this.#offset < this.#buffer.length
    }

    const chunk = result.value
    this.#buffer += typeof chunk === "string" ? chunk : this.#decode(chunk, true)
    return true
  }

  #decode(bytes: Uint8Array, stream: boolean): string {
    try {
      return this.#decoder.decode(bytes, { stream })
    } catch (err) {
      if (err instanceof TypeError) {
        this.fail(`invalid ${this.#charset} byte sequence`)
      }
      throw err
    }
  }
}
