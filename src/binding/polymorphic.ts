import { BindingError } from "@/errors"
import { TokenBuffer } from "@/tokens/token-buffer"
import type { TokenStream } from "@/tokens/types"
import type { ValueBinder } from "@/binding/binder"
import type { ClassSchema } from "@/binding/class-registry"
import type { GenericData } from "@/binding/generic-data"
import type { PolymorphicDescriptor } from "@/binding/types"

type PendingMember = {
  key: string
  tokens: TokenBuffer
}

/**
 * Binds objects whose concrete model is named by a discriminator key.
 *
 * Members that appear before the discriminator are recorded into token buffers. Once the
 * discriminator is read the subtype is known: the recorded members are replayed into the new
 * instance in document order and the rest of the object is bound straight from the stream.
 * The discriminator may therefore appear anywhere in the object.
 */
export class PolymorphicDispatcher {
  #binder: ValueBinder

  constructor(binder: ValueBinder) {
    this.#binder = binder
  }

  /**
   * Bind the object starting at the current START_OBJECT token
   */
  bind(stream: TokenStream, descriptor: PolymorphicDescriptor): GenericData {
    const pending: PendingMember[] = []
    const host = this.#binder.registry.schemaOfDescriptor(descriptor)

    let token = stream.nextToken()
    while (token === "FIELD_NAME") {
      const key = stream.text
      stream.nextToken()

      if (host.field(key)?.wireKey === descriptor.discriminator) {
        const instance = this.#binder.newInstance(this.#resolve(stream, descriptor))

        for (const member of pending) {
          const replay = member.tokens.asTokenStream()
          replay.nextToken()
          this.#binder.bindMember(replay, instance, member.key)
        }

        this.#binder.bindMember(stream, instance, key)
        this.#binder.bindMembers(stream, instance, descriptor.discriminator)
        return instance
      }

      const tokens = new TokenBuffer()
      tokens.copyCurrentStructure(stream)
      pending.push({ key, tokens })
      token = stream.nextToken()
    }

    throw new BindingError({ message: "heterogeneous schema without type field specified" })
  }

  /**
   * Subtype schema named by the discriminator value at the current token
   */
  #resolve(stream: TokenStream, descriptor: PolymorphicDescriptor): ClassSchema {
    const { discriminator } = descriptor
    const token = stream.currentToken

    if (token === "VALUE_NULL") {
      throw new BindingError({ message: "discriminator value is null", path: [discriminator] })
    }
    if (token !== "VALUE_STRING" && token !== "VALUE_NUMBER_INT") {
      throw new BindingError({ message: "discriminator must be a string or integer", path: [discriminator] })
    }

    const subtypes = this.#binder.registry.subtypes(descriptor)
    const schema = subtypes.get(stream.text)
    if (!schema) {
      throw new BindingError({
        message: `no type definition for discriminator value "${stream.text}"; known values: ${[...subtypes.keys()].join(", ")}`,
        path: [discriminator],
      })
    }
    return schema
  }
}
