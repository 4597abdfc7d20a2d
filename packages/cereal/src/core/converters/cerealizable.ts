import * as Either from "effect/Either"

import type { Cerealizer, FactoryAware } from "../cerealizer.js"
import { isCerealizable, requireFactory } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { constructionError, typeMismatch } from "../errors.js"
import type { CerealFactory } from "../factory.js"
import type { GenericValue } from "../generic.js"
import type { ClassType } from "../type-descriptor.js"
import { describeInstance } from "./scalar.js"

// CHANGE: delegate conversion to types that implement Cerealizable themselves
// WHY: a self-convertible type owns its generic shape
// QUOTE(TZ): "construct a wrapping converter, register it in the type map immediately"
// REF: req-cerealizable-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x: toGeneric(x) = x.toCereal(factory)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decoding always starts from a fresh zero-argument instance
// COMPLEXITY: O(1) plus the type's own conversion

export class CerealizableCerealizer implements Cerealizer, FactoryAware {
  private factory: CerealFactory | undefined

  constructor(readonly type: ClassType) {}

  setCerealFactory(factory: CerealFactory): void {
    this.factory = factory
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    if (!isCerealizable(instance)) {
      return Either.left(typeMismatch(`expected ${this.type.name}, got ${describeInstance(instance)}`))
    }
    return Either.flatMap(requireFactory(this.factory, this.type.name), (factory) => instance.toCereal(factory))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return Either.flatMap(requireFactory(this.factory, this.type.name), (factory): Either.Either<unknown, CerealError> => {
      const created = instantiate(this.type)
      if (Either.isLeft(created)) {
        return Either.left(created.left)
      }
      const target = created.right
      if (!isCerealizable(target)) {
        return Either.left(constructionError(`${this.type.name} does not implement Cerealizable`))
      }
      return Either.map(target.applyCereal(value, factory), () => target)
    })
  }
}

/**
 * Call the zero-argument constructor of a class descriptor.
 *
 * @pure false
 * @effect runs user constructor code
 * @complexity O(1)
 */
export const instantiate = <A extends object>(type: ClassType<A>): Either.Either<A, CerealError> => {
  try {
    return Either.right(new type.ctor())
  } catch (cause) {
    return Either.left(constructionError(`failed to construct ${type.name}`, cause))
  }
}
