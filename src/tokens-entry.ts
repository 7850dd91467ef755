/**
 * wirebind/tokens
 *
 * The token layer on its own: a pull-based JSON lexer, a JSON text writer, and an in-memory
 * token buffer that can be replayed as a stream.
 *
 * @example
 * ```ts
 * import { TextTokenStream } from 'wirebind/tokens'
 *
 * const stream = new TextTokenStream('[1, 2]')
 * stream.nextToken() // "START_ARRAY"
 * stream.nextToken() // "VALUE_NUMBER_INT", stream.text === "1"
 * ```
 */

export * from "@/tokens"
