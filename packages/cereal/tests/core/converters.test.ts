import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { CerealFactory } from "../../src/core/factory.js"
import type { GenericValue } from "../../src/core/generic.js"
import type { TypeDescriptor } from "../../src/core/type-descriptor.js"
import { arrayOf, listOf, mapOf, recordOf, setOf, Types, UntypedTypes } from "../../src/core/type-descriptor.js"
import {
  Account,
  AccountType,
  AnimalType,
  Cat,
  CatType,
  ColorType,
  Dog,
  DogType,
  left,
  right,
  Shelter,
  ShelterType,
  testTypes,
  TreeNode,
  TreeNodeType
} from "./fixtures.js"

const factory = new CerealFactory({ types: testTypes })

const write = (type: TypeDescriptor, value: unknown) => right(right(factory.resolve(type)).toGeneric(value))

const read = (type: TypeDescriptor, value: GenericValue) =>
  right(right(factory.resolve(type)).fromGeneric(value))

const failRead = (type: TypeDescriptor, value: GenericValue) =>
  left(right(factory.resolve(type)).fromGeneric(value))

describe("scalar converters", () => {
  it.effect("pass values of the right kind through", () =>
    Effect.sync(() => {
      expect(write(Types.string, "hi")).toBe("hi")
      expect(write(Types.boolean, false)).toBe(false)
      expect(write(Types.char, "x")).toBe("x")
      expect(read(Types.long, 9007199254740991)).toBe(9007199254740991)
      expect(read(Types.double, 0.1)).toBe(0.1)
      expect(read(Types.float, 0.5)).toBe(0.5)
      expect(read(Types.float, 0.1)).toBe(Math.fround(0.1))
    }))

  it.effect("reject values of another kind", () =>
    Effect.sync(() => {
      expect(failRead(Types.string, 1)).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected string, got number",
        path: []
      })
      expect(failRead(Types.boolean, "true")).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected boolean, got string",
        path: []
      })
    }))

  it.effect("reject numbers outside the integral width", () =>
    Effect.sync(() => {
      expect(failRead(Types.byte, 200)).toEqual({
        _tag: "ConversionError",
        kind: "MalformedScalar",
        message: "200 is not a valid byte",
        path: []
      })
      expect(failRead(Types.int, 2.5)).toEqual({
        _tag: "ConversionError",
        kind: "MalformedScalar",
        message: "2.5 is not a valid int",
        path: []
      })
      expect(read(Types.short, -32768)).toBe(-32768)
    }))

  it.effect("reject text longer than one character for char", () =>
    Effect.sync(() => {
      expect(failRead(Types.char, "ab")).toEqual({
        _tag: "ConversionError",
        kind: "MalformedScalar",
        message: "expected a single character, got \"ab\"",
        path: []
      })
    }))
})

describe("dates and bytes", () => {
  const instant = new Date("2024-01-02T03:04:05.000Z")

  it.effect("writes dates as ISO text by default", () =>
    Effect.sync(() => {
      expect(write(Types.date, instant)).toBe("2024-01-02T03:04:05.000Z")
      expect(read(Types.date, "2024-01-02T03:04:05.000Z")).toEqual(instant)
    }))

  it.effect("writes dates as epoch millis when configured", () =>
    Effect.sync(() => {
      const epoch = new CerealFactory({ dateFormat: "epoch" })
      const cerealizer = right(epoch.resolve(Types.date))
      expect(right(cerealizer.toGeneric(instant))).toBe(1704164645000)
      expect(right(cerealizer.fromGeneric(1704164645000))).toEqual(instant)
    }))

  it.effect("rejects text that is not a date", () =>
    Effect.sync(() => {
      expect(failRead(Types.date, "yesterday")).toEqual({
        _tag: "ConversionError",
        kind: "MalformedScalar",
        message: "invalid date",
        path: []
      })
    }))

  it.effect("writes byte sequences as base64", () =>
    Effect.sync(() => {
      expect(write(Types.bytes, new Uint8Array([1, 2, 3]))).toBe("AQID")
      expect(read(arrayOf(Types.byte), "AQID")).toEqual(new Uint8Array([1, 2, 3]))
      expect(failRead(Types.bytes, "!!").kind).toBe("MalformedScalar")
    }))
})

describe("enumerations", () => {
  it.effect("accept declared members only", () =>
    Effect.sync(() => {
      expect(write(ColorType, "GREEN")).toBe("GREEN")
      expect(failRead(ColorType, "PINK")).toEqual({
        _tag: "ConversionError",
        kind: "MalformedScalar",
        message: "\"PINK\" is not a member of test.Color",
        path: []
      })
    }))
})

describe("arrays, collections and maps", () => {
  it.effect("round-trip arrays with absent elements", () =>
    Effect.sync(() => {
      expect(write(arrayOf(Types.int), [1, null, 3])).toEqual([1, null, 3])
      expect(read(arrayOf(Types.int), [1, null, 3])).toEqual([1, null, 3])
    }))

  it.effect("report the index of a failing element", () =>
    Effect.sync(() => {
      expect(failRead(arrayOf(Types.int), [1, "two"])).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected int, got string",
        path: [1]
      })
    }))

  it.effect("round-trip sets through generic arrays", () =>
    Effect.sync(() => {
      const tags = new Set(["a", "b"])
      expect(write(setOf(Types.string), tags)).toEqual(["a", "b"])
      expect(read(setOf(Types.string), ["a", "b"])).toEqual(tags)
    }))

  it.effect("reject an array where a set is declared", () =>
    Effect.sync(() => {
      const error = left(right(factory.resolve(setOf(Types.string))).toGeneric(["a"]))
      expect(error).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected Set<string>, got array",
        path: []
      })
    }))

  it.effect("round-trip records and maps", () =>
    Effect.sync(() => {
      expect(write(recordOf(Types.int), { a: 1, b: 2 })).toEqual({ a: 1, b: 2 })
      expect(read(mapOf(Types.string), { k: "v" })).toEqual(new Map([["k", "v"]]))
      expect(write(mapOf(Types.string), new Map([["k", "v"]]))).toEqual({ k: "v" })
    }))

  it.effect("reject map keys that are not strings", () =>
    Effect.sync(() => {
      const error = left(right(factory.resolve(mapOf(Types.string))).toGeneric(new Map([[1, "v"]])))
      expect(error).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "map keys must be strings, got number",
        path: []
      })
    }))

  it.effect("convert untyped elements by their runtime kind", () =>
    Effect.sync(() => {
      const value = { a: 1, b: [true, "x"], c: null }
      expect(write(UntypedTypes.record, value)).toEqual(value)
      expect(read(UntypedTypes.record, value)).toEqual(value)
      expect(write(listOf(Types.any), ["s", 2])).toEqual(["s", 2])
    }))
})

describe("classes", () => {
  it.effect("round-trip a recursive tree", () =>
    Effect.sync(() => {
      const generic = { name: "root", children: [{ name: "leaf", children: [] }] }
      const tree = read(TreeNodeType, generic)

      expect(tree).toBeInstanceOf(TreeNode)
      if (tree instanceof TreeNode) {
        expect(tree.children[0]).toBeInstanceOf(TreeNode)
        expect(tree.children[0]?.name).toBe("leaf")
        expect(tree.parent).toBeNull()
      }
      expect(write(TreeNodeType, tree)).toEqual(generic)
    }))

  it.effect("omits absent fields and ignores unknown keys", () =>
    Effect.sync(() => {
      const account = new Account()
      account.id = 7
      account.owner = "casey"
      expect(write(AccountType, account)).toEqual({ id: 7, owner: "casey" })

      const decoded = read(AccountType, { id: 8, extra: "ignored" })
      expect(decoded).toBeInstanceOf(Account)
      expect(decoded).toEqual({ id: 8, owner: "" })
    }))

  it.effect("reports a missing required field", () =>
    Effect.sync(() => {
      expect(failRead(AccountType, { owner: "casey" })).toEqual({
        _tag: "ConversionError",
        kind: "MissingField",
        message: "missing required field \"id\"",
        path: ["id"]
      })
    }))

  it.effect("reports the path of a nested failure", () =>
    Effect.sync(() => {
      expect(failRead(TreeNodeType, { name: "root", children: [{ name: 5 }] })).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected string, got number",
        path: ["children", 0, "name"]
      })
    }))

  it.effect("writes subclass values with their discriminator", () =>
    Effect.sync(() => {
      const dog = new Dog()
      dog.name = "Rex"
      dog.breed = "lab"
      const cat = new Cat()
      cat.name = "Tom"
      const shelter = new Shelter()
      shelter.resident = dog
      shelter.animals = [cat]

      const generic = write(ShelterType, shelter)
      expect(generic).toEqual({
        resident: { name: "Rex", breed: "lab", "--class": "test.Dog" },
        animals: [{ name: "Tom", lives: 9, "--class": "test.Cat" }]
      })

      const decoded = read(ShelterType, generic)
      expect(decoded).toBeInstanceOf(Shelter)
      if (decoded instanceof Shelter) {
        expect(decoded.resident).toBeInstanceOf(Dog)
        expect(decoded.resident).toEqual({ name: "Rex", breed: "lab" })
        expect(decoded.animals[0]).toBeInstanceOf(Cat)
      }
    }))

  it.effect("rejects a discriminated map in a scalar field", () =>
    Effect.sync(() => {
      expect(failRead(AccountType, { id: 1, owner: { "--class": "test.Dog", name: "Rex" } })).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected string, got map",
        path: ["owner"]
      })
    }))

  it.effect("rejects a discriminator outside the declared hierarchy", () =>
    Effect.sync(() => {
      expect(failRead(ShelterType, { resident: { "--class": "test.Account", id: 1 } })).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "test.Account is not assignable to test.Animal",
        path: ["resident"]
      })
      expect(failRead(ShelterType, { resident: { "--class": "test.Color" } })).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "test.Color is not assignable to test.Animal",
        path: ["resident"]
      })
    }))

  it.effect("rejects a value that is not an object", () =>
    Effect.sync(() => {
      expect(failRead(TreeNodeType, "root")).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected test.TreeNode, got string",
        path: []
      })
    }))
})

describe("containers of a class type", () => {
  const dog = Object.assign(new Dog(), { name: "Rex", breed: "lab" })
  const tagged = { name: "Rex", breed: "lab", "--class": "test.Dog" }

  it.effect("keep subclass elements of lists and arrays", () =>
    Effect.sync(() => {
      for (const type of [listOf(AnimalType), arrayOf(AnimalType)]) {
        expect(write(type, [dog])).toEqual([tagged])
        const decoded = read(type, [tagged])
        expect(Array.isArray(decoded) ? decoded[0] : undefined).toBeInstanceOf(Dog)
      }
    }))

  it.effect("keep subclass values of records and maps", () =>
    Effect.sync(() => {
      expect(write(recordOf(AnimalType), { a: dog })).toEqual({ a: tagged })
      const record = read(recordOf(AnimalType), { a: tagged })
      expect(record).toEqual({ a: dog })
      if (typeof record === "object" && record !== null) {
        expect(Reflect.get(record, "a")).toBeInstanceOf(Dog)
      }
      const map = read(mapOf(AnimalType), { a: tagged })
      expect(map instanceof Map ? map.get("a") : undefined).toBeInstanceOf(Dog)
    }))

  it.effect("write elements of the declared class without a discriminator", () =>
    Effect.sync(() => {
      const cat = Object.assign(new Cat(), { name: "Tom" })
      expect(write(listOf(CatType), [cat])).toEqual([{ name: "Tom", lives: 9 }])
    }))

  it.effect("reject elements from another registered class", () =>
    Effect.sync(() => {
      const cat = Object.assign(new Cat(), { name: "Tom" })
      expect(left(right(factory.resolve(listOf(DogType))).toGeneric([cat]))).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "expected test.Dog, got test.Cat",
        path: [0]
      })
      expect(failRead(arrayOf(AnimalType), [{ "--class": "test.Account", id: 1 }])).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "test.Account is not assignable to test.Animal",
        path: [0]
      })
    }))
})
