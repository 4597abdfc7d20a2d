import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { Types } from "../../src/core/type-descriptor.js"
import {
  CerealEngine,
  cerealize,
  decerealize,
  decerealizeAs,
  decerealizeRuntime,
  loadEngineLayer,
  makeEngineLayer
} from "../../src/shell/engine.js"
import { AnimalType, Cat, Dog, DogType, testTypes, TreeNode, TreeNodeType } from "../core/fixtures.js"
import { provideNodeContext, withTempDir } from "./test-helpers.js"

const instant = new Date("2024-01-02T03:04:05.000Z")

describe("CerealEngine", () => {
  it.effect("round-trips a value through the service", () =>
    Effect.gen(function*(_) {
      const root = new TreeNode()
      root.name = "root"
      const leaf = new TreeNode()
      leaf.name = "leaf"
      root.children = [leaf]

      const generic = yield* _(cerealize(TreeNodeType, root))
      expect(generic).toEqual({ name: "root", children: [{ name: "leaf", children: [] }] })

      const decoded = yield* _(decerealize(TreeNodeType, generic))
      expect(decoded).toBeInstanceOf(TreeNode)
      expect(decoded).toEqual(root)
    }).pipe(Effect.provide(makeEngineLayer(testTypes, { logLevel: "None" }))))

  it.effect("decodes through the discriminator", () =>
    Effect.gen(function*(_) {
      const animal = yield* _(decerealizeRuntime({ "--class": "test.Cat", name: "Tom", lives: 2 }, AnimalType))
      expect(animal).toBeInstanceOf(Cat)

      const dog = yield* _(decerealizeAs(DogType, { name: "Rex", breed: "lab" }))
      expect(dog.breed).toBe("lab")
      expect(dog).toBeInstanceOf(Dog)
    }).pipe(Effect.provide(makeEngineLayer(testTypes, { logLevel: "None" }))))

  it.effect("fails when the decoded value has another class", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decerealizeAs(DogType, { "--class": "test.Cat", name: "Tom" })))
      expect(error).toEqual({
        _tag: "ConversionError",
        kind: "TypeMismatch",
        message: "decoded value is not an instance of test.Dog",
        path: []
      })
    }).pipe(Effect.provide(makeEngineLayer(testTypes, { logLevel: "None" }))))

  it.effect("surfaces an unknown discriminator", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decerealize(Types.any, { "--class": "test.Unicorn" })))
      expect(error).toEqual({ _tag: "ClassNotFound", name: "test.Unicorn" })
    }).pipe(Effect.provide(makeEngineLayer(testTypes, { logLevel: "None" }))))

  it.effect("exposes the resolved config", () =>
    Effect.gen(function*(_) {
      const engine = yield* _(CerealEngine)
      expect(engine.config).toEqual({ emitDiscriminator: false, dateFormat: "iso", logLevel: "None" })
      const generic = yield* _(cerealize(Types.any, Object.assign(new Dog(), { name: "Rex", breed: "lab" })))
      expect(generic).toEqual({ name: "Rex", breed: "lab" })
    }).pipe(Effect.provide(makeEngineLayer(testTypes, { emitDiscriminator: false, logLevel: "None" }))))
})

describe("loadEngineLayer", () => {
  it.effect("applies the config file under explicit options", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, ".cereal.json")
        yield* _(fs.writeFileString(configPath, `{"dateFormat": "epoch", "emitDiscriminator": false}`))
        const layer = loadEngineLayer(testTypes, configPath, { emitDiscriminator: true, logLevel: "None" })

        const result = yield* _(
          Effect.gen(function*(_) {
            const engine = yield* _(CerealEngine)
            const date = yield* _(cerealize(Types.date, instant))
            return { config: engine.config, date }
          }).pipe(Effect.provide(layer))
        )
        expect(result).toEqual({
          config: { emitDiscriminator: true, dateFormat: "epoch", logLevel: "None" },
          date: 1704164645000
        })
      })
    ).pipe(provideNodeContext))

  it.effect("fails when an explicit config file is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "absent.json")
        const error = yield* _(
          Effect.flip(CerealEngine.pipe(Effect.provide(loadEngineLayer(testTypes, configPath))))
        )
        expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${configPath}` })
      })
    ).pipe(provideNodeContext))
})
