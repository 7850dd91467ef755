import { CharSource, type JsonSource } from "@/tokens/char-source"
import type { JsonToken, TokenStream } from "@/tokens/types"

type Frame = {
  type: "object" | "array"
  /** first: just opened, next: after a member, value: after a field name */
  state: "first" | "next" | "value"
  /** Field name the container was the value of */
  parentName: string | undefined
}

const NUMBER = /^-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/

/**
 * Token stream that lexes JSON text from a string, a byte array, or a lazily pulled iterable of chunks
 *
 * @example
 * ```ts
 * const stream = new TextTokenStream('{"name": "Fido"}')
 * stream.nextToken() // "START_OBJECT"
 * stream.nextToken() // "FIELD_NAME", stream.text === "name"
 * ```
 */
export class TextTokenStream implements TokenStream {
  #source: CharSource
  #stack: Frame[] = []
  #token: JsonToken | undefined = undefined
  #text: string = ""
  #name: string | undefined = undefined
  #rootDone: boolean = false
  #closed: boolean = false

  constructor(source: JsonSource, charset?: string) {
    this.#source = new CharSource(source, charset)
  }

  get currentToken(): JsonToken | undefined {
    return this.#token
  }

  get currentName(): string | undefined {
    return this.#name
  }

  get text(): string {
    return this.#text
  }

  nextToken(): JsonToken | undefined {
    if (this.#closed) return undefined

    this.#token = this.#read()
    return this.#token
  }

  skipChildren(): void {
    if (this.#token !== "START_OBJECT" && this.#token !== "START_ARRAY") return

    let depth = 1
    while (depth > 0) {
      const token = this.nextToken()
      if (token === "START_OBJECT" || token === "START_ARRAY") depth++
      else if (token === "END_OBJECT" || token === "END_ARRAY") depth--
      else if (token === undefined) this.#source.fail("unexpected end of input")
    }
  }

  close(): void {
    this.#closed = true
    this.#token = undefined
    this.#source.close()
  }

  #read(): JsonToken | undefined {
    const source: CharSource = this.#source
    this.#skipWhitespace()
    const frame = this.#stack[this.#stack.length - 1]
    const char = source.peek()

    if (!frame) {
      if (char === undefined) return undefined
      if (this.#rootDone) return source.fail(`unexpected character '${char}' after the end of the document`)
      return this.#readValue()
    }

    if (char === undefined) return source.fail("unexpected end of input")

    if (frame.type === "object") {
      if (frame.state === "value") {
        return this.#readValue()
      }

      if (char === "}") {
        source.next()
        return this.#close("END_OBJECT")
      }

      if (frame.state === "next") {
        if (char !== ",") return source.fail(`expected ',' or '}' but found '${char}'`)
        source.next()
        this.#skipWhitespace()
      }

      if (source.peek() !== '"') return source.fail(`expected a field name but found '${source.peek() ?? "end of input"}'`)
      source.next()
      this.#name = this.#readString()
      this.#text = this.#name

      this.#skipWhitespace()
      if (source.next() !== ":") return source.fail("expected ':' after field name")
      frame.state = "value"
      return "FIELD_NAME"
    }

    // array
    if (char === "]") {
      source.next()
      return this.#close("END_ARRAY")
    }

    if (frame.state === "next") {
      if (char !== ",") return source.fail(`expected ',' or ']' but found '${char}'`)
      source.next()
      this.#skipWhitespace()
    }

    return this.#readValue()
  }

  /**
   * Read the first token of a value at the current position
   */
  #readValue(): JsonToken {
    const source: CharSource = this.#source
    const char = source.peek()

    if (char === "{" || char === "[") {
      source.next()
      this.#stack.push({ type: char === "{" ? "object" : "array", state: "first", parentName: this.#name })
      this.#text = char
      return char === "{" ? "START_OBJECT" : "START_ARRAY"
    }

    if (char === undefined) return source.fail("unexpected end of input")

    let token: JsonToken
    if (char === '"') {
      source.next()
      this.#text = this.#readString()
      token = "VALUE_STRING"
    } else if (/[-0-9]/.test(char)) {
      token = this.#readNumber()
    } else if (/[a-z]/.test(char)) {
      token = this.#readLiteral()
    } else {
      return source.fail(`unexpected character '${char}'`)
    }

    this.#completeValue()
    return token
  }

  #close(token: "END_OBJECT" | "END_ARRAY"): JsonToken {
    const frame = this.#stack.pop()
    this.#name = frame?.parentName
    this.#text = token === "END_OBJECT" ? "}" : "]"
    this.#completeValue()
    return token
  }

  #completeValue(): void {
    const parent = this.#stack[this.#stack.length - 1]
    if (parent) {
      parent.state = "next"
    } else {
      this.#rootDone = true
    }
  }

  #skipWhitespace(): void {
    let char = this.#source.peek()
    while (char === " " || char === "\t" || char === "\n" || char === "\r") {
      this.#source.next()
      char = this.#source.peek()
    }
  }

  /**
   * Read a string body; the opening quote has already been consumed
   */
  #readString(): string {
    const source: CharSource = this.#source
    let out = ""

    while (true) {
      const char = source.next()
      if (char === undefined) return source.fail("unterminated string")
      if (char === '"') return out

      if (char === "\\") {
        const escape = source.next()
        switch (escape) {
          case '"':
            out += '"'
            break
          case "\\":
            out += "\\"
            break
          case "/":
            out += "/"
            break
          case "b":
            out += "\b"
            break
          case "f":
            out += "\f"
            break
          case "n":
            out += "\n"
            break
          case "r":
            out += "\r"
            break
          case "t":
            out += "\t"
            break
          case "u": {
            let hex = ""
            for (let i = 0; i < 4; i++) hex += source.next() ?? ""
            if (!/^[0-9a-fA-F]{4}$/.test(hex)) return source.fail(`invalid unicode escape '\\u${hex}'`)
            out += String.fromCharCode(parseInt(hex, 16))
            break
          }
          default:
            return source.fail(`invalid escape sequence '\\${escape ?? ""}'`)
        }
        continue
      }

      if (char < " ") return source.fail("unescaped control character in string")
      out += char
    }
  }

  #readNumber(): JsonToken {
    const source: CharSource = this.#source
    let literal = ""
    let char = source.peek()

    while (char !== undefined && /[-+.eE0-9]/.test(char)) {
      literal += char
      source.next()
      char = source.peek()
    }

    const match = NUMBER.exec(literal)
    if (!match) return source.fail(`invalid number '${literal}'`)

    this.#text = literal
    return match[1] !== undefined || match[2] !== undefined ? "VALUE_NUMBER_FLOAT" : "VALUE_NUMBER_INT"
  }

  #readLiteral(): JsonToken {
    const source: CharSource = this.#source
    let word = ""
    let char = source.peek()

    while (char !== undefined && /[a-z]/.test(char)) {
      word += char
      source.next()
      char = source.peek()
    }

    this.#text = word
    if (word === "true") return "VALUE_TRUE"
    if (word === "false") return "VALUE_FALSE"
    if (word === "null") return "VALUE_NULL"
    return source.fail(`unexpected literal '${word}'`)
  }
}
