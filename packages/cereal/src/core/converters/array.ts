import * as Either from "effect/Either"

import type { Cerealizer, FactoryAware, Slot } from "../cerealizer.js"
import { fromGenericSlot, toGenericSlot } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { typeMismatch } from "../errors.js"
import type { CerealFactory } from "../factory.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric, isGenericArray } from "../generic.js"
import type { TypeDescriptor } from "../type-descriptor.js"
import { describeInstance } from "./scalar.js"
import { traverseIndexed } from "./traverse.js"

// CHANGE: convert arrays element by element through a resolved delegate
// WHY: array descriptors carry their element type; only class elements consult the runtime type
// QUOTE(TZ): "wrap it in an array converter parametrized by that element type"
// REF: req-array-1
// SOURCE: n/a
// FORMAT THEOREM: ∀xs: |toGeneric(xs)| = |xs|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: null elements bypass the delegate in both directions; class elements keep their subtype
// COMPLEXITY: O(n)

export class ArrayCerealizer implements Cerealizer, FactoryAware {
  private factory: CerealFactory | undefined
  private readonly element: Slot

  constructor(
    readonly delegate: Cerealizer,
    readonly elementType: TypeDescriptor
  ) {
    this.element = { type: elementType, cerealizer: delegate }
  }

  setCerealFactory(factory: CerealFactory): void {
    this.factory = factory
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    if (!Array.isArray(instance)) {
      return Either.left(typeMismatch(`expected ${this.elementType.name}[], got ${describeInstance(instance)}`))
    }
    const items: ReadonlyArray<unknown> = instance
    return traverseIndexed(items, (item) => toGenericSlot(this.factory, this.element, item))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    if (!isGenericArray(value)) {
      return Either.left(typeMismatch(`expected ${this.elementType.name}[], got ${describeGeneric(value)}`))
    }
    return traverseIndexed(value, (item) => fromGenericSlot(this.factory, this.element, item))
  }
}
