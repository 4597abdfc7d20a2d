import * as Either from "effect/Either"

import type { Cerealizer, FactoryAware, Slot } from "../cerealizer.js"
import { fromGenericSlot, requireFactory, toGenericSlot } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { atPath, constructionError, missingField, typeMismatch } from "../errors.js"
import type { CerealFactory } from "../factory.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric, isGenericMap } from "../generic.js"
import type { ClassType, FieldMap } from "../type-descriptor.js"
import { isFieldDescriptor } from "../type-descriptor.js"
import { instantiate } from "./cerealizable.js"
import { describeInstance } from "./scalar.js"

// CHANGE: convert plain classes through their declared field list
// WHY: TypeScript erases field types, so each class declares them once
// QUOTE(TZ): "introspects the type's declared fields/properties"
// REF: req-class-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x: keys(toGeneric(x)) ⊆ declaredFields(type)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: field converters are bound once, after the converter is registered
// COMPLEXITY: O(f) per instance where f = number of fields

interface BoundField extends Slot {
  readonly name: string
  readonly required: boolean
}

const readDeclaredFields = (type: ClassType): Either.Either<FieldMap, CerealError> => {
  try {
    return Either.right(type.fields())
  } catch (cause) {
    return Either.left(constructionError(`failed to read fields of ${type.name}`, cause))
  }
}

export class ClassCerealizer implements Cerealizer, FactoryAware {
  private factory: CerealFactory | undefined
  private fields: ReadonlyArray<BoundField> = []

  constructor(readonly type: ClassType) {}

  setCerealFactory(factory: CerealFactory): void {
    this.factory = factory
  }

  /**
   * Resolve a converter for every declared field.
   *
   * @returns Right once all fields are bound; the first resolution failure otherwise.
   *
   * @pure false
   * @effect may register converters for field types in the factory
   * @invariant on Left the previously bound fields are kept
   * @complexity O(f)
   */
  initialize(): Either.Either<void, CerealError> {
    const factoryEither = requireFactory(this.factory, this.type.name)
    if (Either.isLeft(factoryEither)) {
      return Either.left(factoryEither.left)
    }
    const declared = readDeclaredFields(this.type)
    if (Either.isLeft(declared)) {
      return Either.left(declared.left)
    }
    const bound: Array<BoundField> = []
    for (const [name, entry] of Object.entries(declared.right)) {
      const type = isFieldDescriptor(entry) ? entry.type : entry
      const required = isFieldDescriptor(entry) && entry.required === true
      const resolved = factoryEither.right.resolve(type)
      if (Either.isLeft(resolved)) {
        return Either.left(atPath(name)(resolved.left))
      }
      bound.push({ name, type, required, cerealizer: resolved.right })
    }
    this.fields = bound
    return Either.right(undefined)
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    if (typeof instance !== "object" || instance === null || Array.isArray(instance)) {
      return Either.left(typeMismatch(`expected ${this.type.name}, got ${describeInstance(instance)}`))
    }
    const factoryEither = requireFactory(this.factory, this.type.name)
    if (Either.isLeft(factoryEither)) {
      return Either.left(factoryEither.left)
    }
    const result: Record<string, GenericValue> = {}
    for (const field of this.fields) {
      const value: unknown = Reflect.get(instance, field.name)
      if (value === undefined || value === null) {
        continue
      }
      const converted = toGenericSlot(factoryEither.right, field, value)
      if (Either.isLeft(converted)) {
        return Either.left(atPath(field.name)(converted.left))
      }
      result[field.name] = converted.right
    }
    return Either.right(result)
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    if (!isGenericMap(value)) {
      return Either.left(typeMismatch(`expected ${this.type.name}, got ${describeGeneric(value)}`))
    }
    const factoryEither = requireFactory(this.factory, this.type.name)
    if (Either.isLeft(factoryEither)) {
      return Either.left(factoryEither.left)
    }
    const created = instantiate(this.type)
    if (Either.isLeft(created)) {
      return Either.left(created.left)
    }
    const target = created.right
    for (const field of this.fields) {
      const raw: GenericValue | undefined = Object.hasOwn(value, field.name) ? value[field.name] : undefined
      if (raw === undefined) {
        if (field.required) {
          return Either.left(missingField(field.name))
        }
        continue
      }
      const decoded = Either.mapLeft(fromGenericSlot(factoryEither.right, field, raw), atPath(field.name))
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      if (!Reflect.set(target, field.name, decoded.right)) {
        return Either.left(typeMismatch(`field ${field.name} of ${this.type.name} is not writable`))
      }
    }
    return Either.right(target)
  }
}
