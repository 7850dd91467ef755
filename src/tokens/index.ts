export { CharSource, type JsonSource } from "@/tokens/char-source"
export { JsonWriter, type JsonWriterOptions } from "@/tokens/json-writer"
export { skipToKey } from "@/tokens/navigation"
export { TextTokenStream } from "@/tokens/text-token-stream"
export { BufferedTokenStream, TokenBuffer, type RecordedToken } from "@/tokens/token-buffer"
export { isScalarToken, type JsonToken, type TokenSink, type TokenStream } from "@/tokens/types"
