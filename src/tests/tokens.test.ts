import { describe, it, expect } from "vitest"
import { JsonSyntaxError } from "@/errors"
import { TextTokenStream } from "@/tokens/text-token-stream"
import { TokenBuffer } from "@/tokens/token-buffer"
import { JsonWriter } from "@/tokens/json-writer"
import { skipToKey } from "@/tokens/navigation"
import type { JsonToken, TokenStream } from "@/tokens/types"

const drain = (stream: TokenStream): [JsonToken, string][] => {
  const out: [JsonToken, string][] = []
  for (let token = stream.nextToken(); token !== undefined; token = stream.nextToken()) {
    out.push([token, stream.text])
  }
  return out
}

describe("TextTokenStream", () => {
  it("should emit tokens with their text", () => {
    const stream = new TextTokenStream('{"a": [1, 2.5, "x"], "b": null}')

    expect(drain(stream)).toEqual([
      ["START_OBJECT", "{"],
      ["FIELD_NAME", "a"],
      ["START_ARRAY", "["],
      ["VALUE_NUMBER_INT", "1"],
      ["VALUE_NUMBER_FLOAT", "2.5"],
      ["VALUE_STRING", "x"],
      ["END_ARRAY", "]"],
      ["FIELD_NAME", "b"],
      ["VALUE_NULL", "null"],
      ["END_OBJECT", "}"],
    ])
  })

  it("should classify exponent numbers as floats", () => {
    const stream = new TextTokenStream("[1e3, -0, 10]")

    expect(drain(stream).map(([token]) => token)).toEqual([
      "START_ARRAY",
      "VALUE_NUMBER_FLOAT",
      "VALUE_NUMBER_INT",
      "VALUE_NUMBER_INT",
      "END_ARRAY",
    ])
  })

  it("should decode string escapes", () => {
    const stream = new TextTokenStream('"a\\"b\\n\\u0041\\/"')

    expect(stream.nextToken()).toBe("VALUE_STRING")
    expect(stream.text).toBe('a"b\nA/')
  })

  it("should track the current field name", () => {
    const stream = new TextTokenStream('{"outer": {"inner": 1}, "next": 2}')

    stream.nextToken()
    stream.nextToken()
    expect(stream.currentName).toBe("outer")
    stream.nextToken()
    stream.nextToken()
    expect(stream.currentName).toBe("inner")
    stream.nextToken()
    stream.nextToken()
    expect(stream.currentToken).toBe("END_OBJECT")
    expect(stream.currentName).toBe("outer")
    stream.nextToken()
    expect(stream.currentName).toBe("next")
  })

  it("should skip the children of a container", () => {
    const stream = new TextTokenStream('{"skip": {"a": [1, {"b": 2}]}, "keep": true}')

    stream.nextToken()
    stream.nextToken()
    stream.nextToken()
    stream.skipChildren()
    expect(stream.currentToken).toBe("END_OBJECT")
    expect(stream.nextToken()).toBe("FIELD_NAME")
    expect(stream.text).toBe("keep")
  })

  it("should read UTF-8 bytes split across chunks", () => {
    const bytes = new TextEncoder().encode('{"a":"é"}')
    const stream = new TextTokenStream([bytes.slice(0, 7), bytes.slice(7)])

    expect(drain(stream)).toEqual([
      ["START_OBJECT", "{"],
      ["FIELD_NAME", "a"],
      ["VALUE_STRING", "é"],
      ["END_OBJECT", "}"],
    ])
  })

  it("should reject malformed byte sequences", () => {
    const bytes = new Uint8Array([0x22, 0xff, 0x22])

    expect(() => new TextTokenStream(bytes).nextToken()).toThrow("invalid utf-8 byte sequence")
    expect(() => new TextTokenStream([bytes]).nextToken()).toThrow("invalid utf-8 byte sequence")
  })

  it("should report the position of a syntax error", () => {
    const stream = new TextTokenStream('{"a" 1}')
    stream.nextToken()

    try {
      stream.nextToken()
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(JsonSyntaxError)
      expect(err).toMatchObject({ line: 1, column: 7 })
      expect(String(err)).toContain("expected ':' after field name at line 1, column 7")
    }
  })

  it("should reject content after the root value", () => {
    const stream = new TextTokenStream("{} x")

    expect(stream.nextToken()).toBe("START_OBJECT")
    expect(stream.nextToken()).toBe("END_OBJECT")
    expect(() => stream.nextToken()).toThrow("unexpected character 'x' after the end of the document")
  })

  it("should reject invalid numbers and literals", () => {
    expect(() => new TextTokenStream("01").nextToken()).toThrow("invalid number '01'")
    expect(() => new TextTokenStream("nul").nextToken()).toThrow("unexpected literal 'nul'")
  })

  it("should reject unterminated input", () => {
    const stream = new TextTokenStream('{"a": [1')

    expect(() => drain(stream)).toThrow("unexpected end of input")
  })

  it("should return undefined after close", () => {
    const stream = new TextTokenStream("[1]")
    stream.nextToken()
    stream.close()

    expect(stream.nextToken()).toBeUndefined()
    expect(stream.currentToken).toBeUndefined()
  })
})

describe("TokenBuffer", () => {
  it("should copy one structure and leave the stream on its last token", () => {
    const stream = new TextTokenStream('{"a": {"b": [1, true]}, "c": 2}')
    stream.nextToken()
    stream.nextToken()
    stream.nextToken()

    const buffer = new TokenBuffer()
    buffer.copyCurrentStructure(stream)

    expect(buffer.size).toBe(7)
    expect(stream.currentToken).toBe("END_OBJECT")
    expect(stream.nextToken()).toBe("FIELD_NAME")
    expect(stream.text).toBe("c")
  })

  it("should replay recorded tokens", () => {
    const stream = new TextTokenStream('{"b": [1, true]}')
    stream.nextToken()

    const buffer = new TokenBuffer()
    buffer.copyCurrentStructure(stream)

    expect(drain(buffer.asTokenStream())).toEqual([
      ["START_OBJECT", "{"],
      ["FIELD_NAME", "b"],
      ["START_ARRAY", "["],
      ["VALUE_NUMBER_INT", "1"],
      ["VALUE_TRUE", "true"],
      ["END_ARRAY", "]"],
      ["END_OBJECT", "}"],
    ])
  })

  it("should copy a single scalar", () => {
    const stream = new TextTokenStream('"solo"')
    stream.nextToken()

    const buffer = new TokenBuffer()
    buffer.copyCurrentStructure(stream)

    expect(buffer.tokens).toEqual([{ token: "VALUE_STRING", text: "solo" }])
  })

  it("should record written tokens as a sink", () => {
    const buffer = new TokenBuffer()
    buffer.writeStartArray()
    buffer.writeNumber("1.5")
    buffer.writeNumber("7")
    buffer.writeString("x")
    buffer.writeEndArray()

    expect(buffer.tokens.map(({ token }) => token)).toEqual([
      "START_ARRAY",
      "VALUE_NUMBER_FLOAT",
      "VALUE_NUMBER_INT",
      "VALUE_STRING",
      "END_ARRAY",
    ])
  })

  it("should skip children while replaying", () => {
    const buffer = new TokenBuffer()
    buffer.writeStartArray()
    buffer.writeStartObject()
    buffer.writeFieldName("a")
    buffer.writeNull()
    buffer.writeEndObject()
    buffer.writeBoolean(false)
    buffer.writeEndArray()

    const replay = buffer.asTokenStream()
    replay.nextToken()
    replay.nextToken()
    replay.skipChildren()

    expect(replay.currentToken).toBe("END_OBJECT")
    expect(replay.nextToken()).toBe("VALUE_FALSE")
  })
})

describe("JsonWriter", () => {
  const writeSample = (writer: JsonWriter) => {
    writer.writeStartObject()
    writer.writeFieldName("a")
    writer.writeNumber("1")
    writer.writeFieldName("b")
    writer.writeStartArray()
    writer.writeBoolean(true)
    writer.writeNull()
    writer.writeEndArray()
    writer.writeEndObject()
  }

  it("should write compact JSON", () => {
    const writer = new JsonWriter()
    writeSample(writer)

    expect(writer.toString()).toBe('{"a":1,"b":[true,null]}')
  })

  it("should write indented JSON", () => {
    const writer = new JsonWriter({ indent: 2 })
    writeSample(writer)

    expect(writer.toString()).toBe('{\n  "a": 1,\n  "b": [\n    true,\n    null\n  ]\n}')
  })

  it("should escape strings", () => {
    const writer = new JsonWriter()
    writer.writeString('say "hi"\n')

    expect(writer.toString()).toBe('"say \\"hi\\"\\n"')
  })

  it("should write empty containers", () => {
    const writer = new JsonWriter({ indent: 2 })
    writer.writeStartArray()
    writer.writeStartObject()
    writer.writeEndObject()
    writer.writeEndArray()

    expect(writer.toString()).toBe("[\n  {}\n]")
  })

  it("should reject a value without a field name inside an object", () => {
    const writer = new JsonWriter()
    writer.writeStartObject()

    expect(() => writer.writeNumber("1")).toThrow("object value written without a field name")
  })

  it("should reject unbalanced ends", () => {
    const writer = new JsonWriter()
    writer.writeStartArray()

    expect(() => writer.writeEndObject()).toThrow("unbalanced '}'")
  })
})

describe("skipToKey", () => {
  it("should stop on the value of the first matching key", () => {
    const stream = new TextTokenStream('{"meta": {"x": [1]}, "data": {"id": 1}}')

    expect(skipToKey(stream, ["data"])).toBe("data")
    expect(stream.currentToken).toBe("START_OBJECT")
    expect(stream.nextToken()).toBe("FIELD_NAME")
    expect(stream.text).toBe("id")
  })

  it("should leave the stream on the end of the object when no key matches", () => {
    const stream = new TextTokenStream('{"meta": 1, "other": [2]}')

    expect(skipToKey(stream, ["data", "result"])).toBeUndefined()
    expect(stream.currentToken).toBe("END_OBJECT")
  })
})
