import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CerealError, ConstructionError } from "./errors.js"
import { constructionError, typeMismatch } from "./errors.js"
import type { CerealFactory } from "./factory.js"
import type { GenericValue } from "./generic.js"
import type { ClassType, TypeDescriptor } from "./type-descriptor.js"

// CHANGE: define the converter contract and its optional capabilities
// WHY: the engine dispatches over converters without knowing their variant
// QUOTE(TZ): "symmetric and meant to round-trip"
// REF: req-contract-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c,v: c.fromGeneric(c.toGeneric(v)) ≅ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: conversions never throw on shape mismatch; they return Left
// COMPLEXITY: O(1)/O(1)

export interface Cerealizer {
  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError>
  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError>
}

export interface FactoryAware {
  setCerealFactory(factory: CerealFactory): void
}

/** A type that converts itself; `applyCereal` fills a freshly constructed instance. */
export interface Cerealizable {
  toCereal(factory: CerealFactory): Either.Either<GenericValue, CerealError>
  applyCereal(cereal: GenericValue, factory: CerealFactory): Either.Either<void, CerealError>
}

export type ConverterClass = new () => Cerealizer

export const isFactoryAware = (cerealizer: Cerealizer): cerealizer is Cerealizer & FactoryAware =>
  "setCerealFactory" in cerealizer && typeof cerealizer.setCerealFactory === "function"

export const isCerealizable = (value: unknown): value is Cerealizable =>
  typeof value === "object" &&
  value !== null &&
  "toCereal" in value &&
  typeof value.toCereal === "function" &&
  "applyCereal" in value &&
  typeof value.applyCereal === "function"

export const requireFactory = (
  factory: CerealFactory | undefined,
  owner: string
): Either.Either<CerealFactory, ConstructionError> =>
  factory === undefined
    ? Either.left(constructionError(`${owner} used before a factory was attached`))
    : Either.right(factory)

const runtimeConstructor = (value: unknown): unknown =>
  typeof value === "object" && value !== null ? Object.getPrototypeOf(value)?.constructor : undefined

const isAssignable = (runtime: ClassType, declared: ClassType): boolean =>
  runtime.ctor === declared.ctor || runtime.ctor.prototype instanceof declared.ctor

/** A declared type together with the converter resolved for it. */
export interface Slot {
  readonly type: TypeDescriptor
  readonly cerealizer: Cerealizer
}

/**
 * Write the value held by a field, element or map entry.
 *
 * A registered subclass of a class-typed slot goes through the dynamic
 * converter so its discriminator survives; absent values stay null.
 *
 * @pure true
 * @invariant a registered class outside the declared hierarchy is a TypeMismatch
 * @complexity O(1) plus the chosen converter
 */
export const toGenericSlot = (
  factory: CerealFactory | undefined,
  slot: Slot,
  instance: unknown
): Either.Either<GenericValue, CerealError> => {
  if (instance === null || instance === undefined) {
    return Either.right(null)
  }
  const declared = slot.type
  if (declared._tag !== "Class") {
    return slot.cerealizer.toGeneric(instance)
  }
  const ctor = runtimeConstructor(instance)
  if (ctor === declared.ctor) {
    return slot.cerealizer.toGeneric(instance)
  }
  return Either.flatMap(requireFactory(factory, declared.name), (attached) =>
    Option.match(attached.types.byConstructor(ctor), {
      onNone: () => slot.cerealizer.toGeneric(instance),
      onSome: (runtime): Either.Either<GenericValue, CerealError> =>
        isAssignable(runtime, declared)
          ? attached.getDynamicCerealizer().toGeneric(instance)
          : Either.left(typeMismatch(`expected ${declared.name}, got ${runtime.name}`))
    }))
}

const runtimeReader = (
  factory: CerealFactory,
  slot: Slot,
  declared: ClassType,
  value: GenericValue
): Either.Either<Cerealizer, CerealError> =>
  Either.flatMap(factory.resolveRuntimeClass(value), (runtime) =>
    Option.match(runtime, {
      onNone: (): Either.Either<Cerealizer, CerealError> => Either.right(slot.cerealizer),
      onSome: (type) =>
        type._tag === "Class" && isAssignable(type, declared)
          ? factory.resolve(type)
          : Either.left(typeMismatch(`${type.name} is not assignable to ${declared.name}`))
    }))

/**
 * Read the value of a field, element or map entry.
 *
 * Only class-typed slots honour the discriminator, and only for subclasses of
 * the declared class; every other slot keeps its declared converter.
 *
 * @pure true
 * @complexity O(1) plus the chosen converter
 */
export const fromGenericSlot = (
  factory: CerealFactory | undefined,
  slot: Slot,
  value: GenericValue
): Either.Either<unknown, CerealError> => {
  if (value === null) {
    return Either.right(null)
  }
  const declared = slot.type
  if (declared._tag !== "Class") {
    return slot.cerealizer.fromGeneric(value)
  }
  return Either.flatMap(requireFactory(factory, declared.name), (attached) =>
    Either.flatMap(runtimeReader(attached, slot, declared, value), (reader) => reader.fromGeneric(value)))
}
