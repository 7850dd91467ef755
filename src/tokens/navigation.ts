import type { TokenStream } from "@/tokens/types"

/**
 * Advance through the members of the current object until one of `keys` is found.
 *
 * On a match the stream is left on the first token of that member's value and the key is
 * returned. Otherwise the stream ends on the object's END_OBJECT and the result is undefined.
 * A fresh stream, or one positioned on START_OBJECT, starts at the object's first member.
 */
export function skipToKey(stream: TokenStream, keys: Iterable<string>): string | undefined {
  const wanted = new Set(keys)

  let token = stream.currentToken ?? stream.nextToken()
  if (token === "START_OBJECT") token = stream.nextToken()

  while (token === "FIELD_NAME") {
    const key = stream.text
    stream.nextToken()
    if (wanted.has(key)) return key

    stream.skipChildren()
    token = stream.nextToken()
  }

  return undefined
}
