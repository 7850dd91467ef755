import type { ModelNode } from "@/schema/model"
import { BindingError } from "@/errors"
import { describe } from "@/binding/descriptor"
import type { TypeDescriptor, TypeEnvironment } from "@/binding/types"

/**
 * One model of a hierarchy with its type parameters bound
 */
export interface ResolvedModel {
  model: ModelNode
  env: TypeEnvironment
}

/**
 * Walk from `model` up to its root ancestor, binding each ancestor's type parameters.
 * The arguments a model passes to its parent are resolved in the model's own environment,
 * so `Page<T>` extending `Container<Item = T>` sees `Item` bound to whatever `T` is.
 *
 * @returns the hierarchy ordered from the root ancestor down to `model`
 */
export function resolveHierarchy(model: ModelNode, env: TypeEnvironment): ResolvedModel[] {
  const chain: ResolvedModel[] = []
  const seen = new Set<ModelNode>()

  let current: ModelNode = model
  let currentEnv = env
  checkArguments(current, currentEnv)

  while (true) {
    if (seen.has(current)) {
      throw new BindingError({ message: `${model.name} inherits from itself` })
    }
    seen.add(current)
    chain.push({ model: current, env: currentEnv })

    const parent = current.parent
    if (!parent) break

    const parentEnv = new Map<string, TypeDescriptor>()
    for (const [name, argument] of Object.entries(parent.args)) {
      parentEnv.set(name, describe(argument, currentEnv))
    }
    checkArguments(parent.model, parentEnv)

    current = parent.model
    currentEnv = parentEnv
  }

  return chain.reverse()
}

function checkArguments(model: ModelNode, env: TypeEnvironment): void {
  for (const name of env.keys()) {
    if (!model.typeParams.includes(name)) {
      throw new BindingError({ message: `${model.name} does not declare a type parameter named ${name}` })
    }
  }
}
