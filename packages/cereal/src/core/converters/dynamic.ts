import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Cerealizer, FactoryAware } from "../cerealizer.js"
import { requireFactory } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { typeMismatch } from "../errors.js"
import type { CerealFactory } from "../factory.js"
import type { GenericValue } from "../generic.js"
import { DISCRIMINATOR_KEY, isGenericArray, isGenericMap } from "../generic.js"
import type { TypeDescriptor } from "../type-descriptor.js"
import { Types, UntypedTypes } from "../type-descriptor.js"
import { isPlainObject } from "./map.js"
import { describeInstance } from "./scalar.js"
import { traverseEntries, traverseIndexed } from "./traverse.js"

// CHANGE: convert slots declared as Object by inspecting the runtime value
// WHY: polymorphic slots carry the concrete type name inside the generic map
// QUOTE(TZ): "defers to runtime class resolution"
// REF: req-dynamic-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ registered: fromGeneric(toGeneric(x)) instanceof ctor(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the discriminator is only written for registered class instances
// COMPLEXITY: O(n) in the size of the value

export interface DynamicOptions {
  readonly emitDiscriminator?: boolean
}

export class DynamicCerealizer implements Cerealizer, FactoryAware {
  private factory: CerealFactory | undefined
  private readonly emitDiscriminator: boolean

  constructor(options: DynamicOptions = {}) {
    this.emitDiscriminator = options.emitDiscriminator ?? true
  }

  setCerealFactory(factory: CerealFactory): void {
    this.factory = factory
  }

  private runtimeType(factory: CerealFactory, instance: unknown): Either.Either<TypeDescriptor, CerealError> {
    switch (typeof instance) {
      case "string":
        return Either.right(Types.string)
      case "boolean":
        return Either.right(Types.boolean)
      case "number":
        return Either.right(Types.double)
      default:
        break
    }
    if (instance instanceof Date) {
      return Either.right(Types.date)
    }
    if (instance instanceof Uint8Array) {
      return Either.right(Types.bytes)
    }
    if (Array.isArray(instance)) {
      return Either.right(UntypedTypes.list)
    }
    if (instance instanceof Set) {
      return Either.right(UntypedTypes.set)
    }
    if (instance instanceof Map) {
      return Either.right(UntypedTypes.map)
    }
    if (isPlainObject(instance)) {
      return Either.right(UntypedTypes.record)
    }
    const ctor: unknown = typeof instance === "object" && instance !== null
      ? Object.getPrototypeOf(instance)?.constructor
      : undefined
    return Option.match(factory.types.byConstructor(ctor), {
      onNone: () => Either.left(typeMismatch(`no registered type for ${describeInstance(instance)} value`)),
      onSome: (type): Either.Either<TypeDescriptor, CerealError> => Either.right(type)
    })
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    if (instance === null || instance === undefined) {
      return Either.right(null)
    }
    const factoryEither = requireFactory(this.factory, "DynamicCerealizer")
    if (Either.isLeft(factoryEither)) {
      return Either.left(factoryEither.left)
    }
    const factory = factoryEither.right
    const typeEither = this.runtimeType(factory, instance)
    if (Either.isLeft(typeEither)) {
      return Either.left(typeEither.left)
    }
    const type = typeEither.right
    const converted = Either.flatMap(factory.resolve(type), (cerealizer) => cerealizer.toGeneric(instance))
    if (!this.emitDiscriminator || type._tag !== "Class") {
      return converted
    }
    return Either.map(converted, (cereal): GenericValue =>
      isGenericMap(cereal) ? { ...cereal, [DISCRIMINATOR_KEY]: type.name } : cereal)
  }

  private fromStructure(value: GenericValue): Either.Either<unknown, CerealError> {
    if (isGenericArray(value)) {
      return traverseIndexed(value, (item) => this.fromGeneric(item))
    }
    if (isGenericMap(value)) {
      return Either.map(
        traverseEntries(Object.entries(value), (item) => this.fromGeneric(item)),
        (entries) => Object.fromEntries(entries)
      )
    }
    return Either.right(value)
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    const factoryEither = requireFactory(this.factory, "DynamicCerealizer")
    if (Either.isLeft(factoryEither)) {
      return Either.left(factoryEither.left)
    }
    const runtime = factoryEither.right.resolveRuntimeClass(value)
    if (Either.isLeft(runtime)) {
      return Either.left(runtime.left)
    }
    return Option.match(runtime.right, {
      onNone: () => this.fromStructure(value),
      onSome: (type) =>
        Either.flatMap(factoryEither.right.resolve(type), (cerealizer) => cerealizer.fromGeneric(value))
    })
  }
}
