import * as Either from "effect/Either"

import type { Cerealizer, FactoryAware, Slot } from "../cerealizer.js"
import { fromGenericSlot, requireFactory, toGenericSlot } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { typeMismatch } from "../errors.js"
import type { CerealFactory } from "../factory.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric, isGenericMap } from "../generic.js"
import type { MapType } from "../type-descriptor.js"
import { Types } from "../type-descriptor.js"
import { describeInstance } from "./scalar.js"
import { traverseEntries } from "./traverse.js"

// CHANGE: convert string-keyed records and Maps into generic maps
// WHY: associative containers share one converter per concrete map descriptor
// QUOTE(TZ): "construct an associative-container converter bound to the concrete map type"
// REF: req-map-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m: keys(toGeneric(m)) = keys(m)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: keys are strings on both sides
// COMPLEXITY: O(n)

export const isPlainObject = (value: unknown): value is Readonly<Record<string, unknown>> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

const stringEntries = (map: ReadonlyMap<unknown, unknown>): Either.Either<Array<readonly [string, unknown]>, CerealError> => {
  const entries: Array<readonly [string, unknown]> = []
  for (const [key, value] of map) {
    if (typeof key !== "string") {
      return Either.left(typeMismatch(`map keys must be strings, got ${describeInstance(key)}`))
    }
    entries.push([key, value])
  }
  return Either.right(entries)
}

export class MapCerealizer implements Cerealizer, FactoryAware {
  private factory: CerealFactory | undefined
  private value: Slot

  constructor(
    dynamic: Cerealizer,
    readonly type: MapType
  ) {
    this.value = { type: Types.any, cerealizer: dynamic }
  }

  setCerealFactory(factory: CerealFactory): void {
    this.factory = factory
  }

  initialize(): Either.Either<void, CerealError> {
    const declared = this.type.value
    if (declared === undefined) {
      return Either.right(undefined)
    }
    return Either.map(
      Either.flatMap(requireFactory(this.factory, this.type.name), (factory) => factory.resolve(declared)),
      (cerealizer) => {
        this.value = { type: declared, cerealizer }
      }
    )
  }

  private entries(instance: unknown): Either.Either<Iterable<readonly [string, unknown]>, CerealError> {
    if (this.type.kind === "map") {
      return instance instanceof Map
        ? stringEntries(instance)
        : Either.left(typeMismatch(`expected ${this.type.name}, got ${describeInstance(instance)}`))
    }
    return isPlainObject(instance)
      ? Either.right(Object.entries(instance))
      : Either.left(typeMismatch(`expected ${this.type.name}, got ${describeInstance(instance)}`))
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return Either.flatMap(this.entries(instance), (entries) =>
      Either.map(
        traverseEntries(entries, (item) => toGenericSlot(this.factory, this.value, item)),
        (converted): GenericValue => Object.fromEntries(converted)
      ))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    if (!isGenericMap(value)) {
      return Either.left(typeMismatch(`expected ${this.type.name}, got ${describeGeneric(value)}`))
    }
    const decoded = traverseEntries(Object.entries(value), (item) => fromGenericSlot(this.factory, this.value, item))
    return this.type.kind === "map"
      ? Either.map(decoded, (entries) => new Map(entries))
      : Either.map(decoded, (entries) => Object.fromEntries(entries))
  }
}
