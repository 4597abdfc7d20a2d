import * as Either from "effect/Either"

import type { Cerealizable, Cerealizer, FactoryAware } from "../../src/core/cerealizer.js"
import type { CerealError } from "../../src/core/errors.js"
import { renderError, typeMismatch } from "../../src/core/errors.js"
import type { CerealFactory } from "../../src/core/factory.js"
import type { GenericValue } from "../../src/core/generic.js"
import { isGenericArray } from "../../src/core/generic.js"
import type { ClassType } from "../../src/core/type-descriptor.js"
import { classType, enumType, field, listOf, Types, UntypedTypes } from "../../src/core/type-descriptor.js"
import type { TypeTable } from "../../src/core/type-table.js"
import { makeTypeTable } from "../../src/core/type-table.js"

export const right = <A>(either: Either.Either<A, CerealError>): A =>
  Either.getOrThrowWith(either, (error) => new Error(renderError(error)))

export const left = <A>(either: Either.Either<A, CerealError>): CerealError =>
  Either.match(either, {
    onLeft: (error) => error,
    onRight: () => {
      throw new Error("expected Left")
    }
  })

export class TreeNode {
  name = ""
  children: Array<TreeNode> = []
  parent: TreeNode | null = null
}

export const TreeNodeType: ClassType<TreeNode> = classType({
  name: "test.TreeNode",
  ctor: TreeNode,
  fields: () => ({ name: Types.string, children: listOf(TreeNodeType), parent: TreeNodeType })
})

export class Animal {
  name = ""
}

export class Dog extends Animal {
  breed = ""
}

export class Cat extends Animal {
  lives = 9
}

export const AnimalType = classType({
  name: "test.Animal",
  ctor: Animal,
  fields: () => ({ name: Types.string })
})

export const DogType = classType({
  name: "test.Dog",
  ctor: Dog,
  fields: () => ({ name: Types.string, breed: Types.string })
})

export const CatType = classType({
  name: "test.Cat",
  ctor: Cat,
  fields: () => ({ name: Types.string, lives: Types.int })
})

export class Shelter {
  resident: Animal | null = null
  animals: Array<unknown> = []
}

export const ShelterType = classType({
  name: "test.Shelter",
  ctor: Shelter,
  fields: () => ({ resident: AnimalType, animals: UntypedTypes.list })
})

export class Account {
  id = 0
  owner = ""
}

export const AccountType = classType({
  name: "test.Account",
  ctor: Account,
  fields: () => ({ id: field(Types.int, { required: true }), owner: Types.string })
})

export const ColorType = enumType("test.Color", ["RED", "GREEN", "BLUE"])

export class Point implements Cerealizable {
  x = 0
  y = 0

  toCereal(): Either.Either<GenericValue, CerealError> {
    return Either.right([this.x, this.y])
  }

  applyCereal(cereal: GenericValue): Either.Either<void, CerealError> {
    if (!isGenericArray(cereal)) {
      return Either.left(typeMismatch("expected [x, y]"))
    }
    const [x, y] = cereal
    if (typeof x !== "number" || typeof y !== "number") {
      return Either.left(typeMismatch("expected [x, y]"))
    }
    this.x = x
    this.y = y
    return Either.right(undefined)
  }
}

export const PointType = classType({ name: "test.Point", ctor: Point })

export class Label {
  text = ""
}

export class ShoutCerealizer implements Cerealizer, FactoryAware {
  factory: CerealFactory | undefined

  setCerealFactory(factory: CerealFactory): void {
    this.factory = factory
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return instance instanceof Label
      ? Either.right(instance.text.toUpperCase())
      : Either.left(typeMismatch("expected Label"))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    if (typeof value !== "string") {
      return Either.left(typeMismatch("expected text"))
    }
    const label = new Label()
    label.text = value.toLowerCase()
    return Either.right(label)
  }
}

export const LabelType = classType({ name: "test.Label", ctor: Label, cerealizer: ShoutCerealizer })

export class ExplodingCerealizer implements Cerealizer {
  constructor() {
    throw new Error("boom")
  }

  toGeneric(): Either.Either<GenericValue, CerealError> {
    return Either.right(null)
  }

  fromGeneric(): Either.Either<unknown, CerealError> {
    return Either.right(null)
  }
}

export class Fragile {}

export const FragileType = classType({ name: "test.Fragile", ctor: Fragile, cerealizer: ExplodingCerealizer })

export class Holder {
  fragile: Fragile | null = null
}

export const HolderType = classType({
  name: "test.Holder",
  ctor: Holder,
  fields: () => ({ label: Types.string, fragile: FragileType })
})

export const testTypes: TypeTable = Either.getOrThrow(
  makeTypeTable([TreeNodeType, AnimalType, DogType, CatType, ShelterType, AccountType, ColorType, PointType])
)
