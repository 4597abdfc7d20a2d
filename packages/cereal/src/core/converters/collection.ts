import * as Either from "effect/Either"

import type { Cerealizer, FactoryAware, Slot } from "../cerealizer.js"
import { fromGenericSlot, requireFactory, toGenericSlot } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { typeMismatch } from "../errors.js"
import type { CerealFactory } from "../factory.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric, isGenericArray } from "../generic.js"
import type { CollectionType } from "../type-descriptor.js"
import { Types } from "../type-descriptor.js"
import { describeInstance } from "./scalar.js"
import { traverseIndexed } from "./traverse.js"

// CHANGE: convert lists and sets with a declared or dynamic element converter
// WHY: untyped collections fall back to runtime dispatch per element
// QUOTE(TZ): "configured with the dynamic converter as its element fallback"
// REF: req-collection-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: |toGeneric(c)| = size(c)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the element converter is fixed after initialize
// COMPLEXITY: O(n)

export class CollectionCerealizer implements Cerealizer, FactoryAware {
  private factory: CerealFactory | undefined
  private element: Slot

  constructor(
    dynamic: Cerealizer,
    readonly type: CollectionType
  ) {
    this.element = { type: Types.any, cerealizer: dynamic }
  }

  setCerealFactory(factory: CerealFactory): void {
    this.factory = factory
  }

  initialize(): Either.Either<void, CerealError> {
    const declared = this.type.element
    if (declared === undefined) {
      return Either.right(undefined)
    }
    return Either.map(
      Either.flatMap(requireFactory(this.factory, this.type.name), (factory) => factory.resolve(declared)),
      (cerealizer) => {
        this.element = { type: declared, cerealizer }
      }
    )
  }

  private items(instance: unknown): Either.Either<Iterable<unknown>, CerealError> {
    if (this.type.kind === "set") {
      return instance instanceof Set
        ? Either.right(instance.values())
        : Either.left(typeMismatch(`expected ${this.type.name}, got ${describeInstance(instance)}`))
    }
    return Array.isArray(instance)
      ? Either.right(instance.values())
      : Either.left(typeMismatch(`expected ${this.type.name}, got ${describeInstance(instance)}`))
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return Either.flatMap(
      this.items(instance),
      (items) => traverseIndexed(items, (item) => toGenericSlot(this.factory, this.element, item))
    )
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    if (!isGenericArray(value)) {
      return Either.left(typeMismatch(`expected ${this.type.name}, got ${describeGeneric(value)}`))
    }
    const decoded = traverseIndexed(value, (item) => fromGenericSlot(this.factory, this.element, item))
    return this.type.kind === "set" ? Either.map(decoded, (items) => new Set(items)) : decoded
  }
}
