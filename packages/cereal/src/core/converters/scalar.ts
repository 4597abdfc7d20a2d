import * as Either from "effect/Either"

import type { Cerealizer } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { malformedScalar, typeMismatch } from "../errors.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric } from "../generic.js"

// CHANGE: provide the fixed leaf converters for scalar kinds
// WHY: scalars are registered once at factory construction
// QUOTE(TZ): "string/boolean/char/integer-width/float-width"
// REF: req-leaf-scalar-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ range(kind): fromGeneric(toGeneric(x)) = x
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: integral converters only accept integers inside their width
// COMPLEXITY: O(1)/O(1)

export const describeInstance = (instance: unknown): string =>
  instance === null ? "null" : Array.isArray(instance) ? "array" : typeof instance

export class StringCerealizer implements Cerealizer {
  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return typeof instance === "string"
      ? Either.right(instance)
      : Either.left(typeMismatch(`expected string, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return typeof value === "string"
      ? Either.right(value)
      : Either.left(typeMismatch(`expected string, got ${describeGeneric(value)}`))
  }
}

export class BooleanCerealizer implements Cerealizer {
  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return typeof instance === "boolean"
      ? Either.right(instance)
      : Either.left(typeMismatch(`expected boolean, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return typeof value === "boolean"
      ? Either.right(value)
      : Either.left(typeMismatch(`expected boolean, got ${describeGeneric(value)}`))
  }
}

const checkChar = (value: string): Either.Either<string, CerealError> =>
  [...value].length === 1
    ? Either.right(value)
    : Either.left(malformedScalar(`expected a single character, got ${JSON.stringify(value)}`))

export class CharCerealizer implements Cerealizer {
  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return typeof instance === "string"
      ? checkChar(instance)
      : Either.left(typeMismatch(`expected char, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return typeof value === "string"
      ? checkChar(value)
      : Either.left(typeMismatch(`expected char, got ${describeGeneric(value)}`))
  }
}

abstract class IntegralCerealizer implements Cerealizer {
  protected abstract readonly label: string
  protected abstract readonly min: number
  protected abstract readonly max: number

  private check(value: number): Either.Either<number, CerealError> {
    if (!Number.isInteger(value) || value < this.min || value > this.max) {
      return Either.left(malformedScalar(`${value} is not a valid ${this.label}`))
    }
    return Either.right(value)
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return typeof instance === "number"
      ? this.check(instance)
      : Either.left(typeMismatch(`expected ${this.label}, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return typeof value === "number"
      ? this.check(value)
      : Either.left(typeMismatch(`expected ${this.label}, got ${describeGeneric(value)}`))
  }
}

export class ByteCerealizer extends IntegralCerealizer {
  protected readonly label = "byte"
  protected readonly min = -128
  protected readonly max = 127
}

export class ShortCerealizer extends IntegralCerealizer {
  protected readonly label = "short"
  protected readonly min = -32768
  protected readonly max = 32767
}

export class IntegerCerealizer extends IntegralCerealizer {
  protected readonly label = "int"
  protected readonly min = -2147483648
  protected readonly max = 2147483647
}

export class LongCerealizer extends IntegralCerealizer {
  protected readonly label = "long"
  protected readonly min = Number.MIN_SAFE_INTEGER
  protected readonly max = Number.MAX_SAFE_INTEGER
}

const checkFinite = (value: number, label: string): Either.Either<number, CerealError> =>
  Number.isFinite(value) ? Either.right(value) : Either.left(malformedScalar(`${value} is not a finite ${label}`))

export class FloatCerealizer implements Cerealizer {
  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return typeof instance === "number"
      ? checkFinite(instance, "float")
      : Either.left(typeMismatch(`expected float, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return typeof value === "number"
      ? Either.map(checkFinite(value, "float"), Math.fround)
      : Either.left(typeMismatch(`expected float, got ${describeGeneric(value)}`))
  }
}

export class DoubleCerealizer implements Cerealizer {
  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return typeof instance === "number"
      ? checkFinite(instance, "double")
      : Either.left(typeMismatch(`expected double, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return typeof value === "number"
      ? checkFinite(value, "double")
      : Either.left(typeMismatch(`expected double, got ${describeGeneric(value)}`))
  }
}
