import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Cerealizer, ConverterClass } from "./cerealizer.js"
import { isCerealizable, isFactoryAware } from "./cerealizer.js"
import type { DateFormat } from "./config.js"
import { defaultConfig } from "./config.js"
import { ArrayCerealizer } from "./converters/array.js"
import { BytesCerealizer } from "./converters/bytes.js"
import { CerealizableCerealizer } from "./converters/cerealizable.js"
import { ClassCerealizer } from "./converters/class.js"
import { CollectionCerealizer } from "./converters/collection.js"
import { DynamicCerealizer } from "./converters/dynamic.js"
import { EnumCerealizer } from "./converters/enum.js"
import { MapCerealizer } from "./converters/map.js"
import {
  BooleanCerealizer,
  ByteCerealizer,
  CharCerealizer,
  DoubleCerealizer,
  FloatCerealizer,
  IntegerCerealizer,
  LongCerealizer,
  ShortCerealizer,
  StringCerealizer
} from "./converters/scalar.js"
import { DateCerealizer } from "./converters/temporal.js"
import type { CerealError, ClassNotFound } from "./errors.js"
import { classNotFound, constructionError } from "./errors.js"
import type { GenericValue } from "./generic.js"
import { DISCRIMINATOR_KEY, isGenericMap } from "./generic.js"
import type { ArrayType, ClassType, CollectionType, MapType, TypeDescriptor } from "./type-descriptor.js"
import { Types } from "./type-descriptor.js"
import type { TypeTable } from "./type-table.js"
import { emptyTypeTable } from "./type-table.js"

// CHANGE: resolve converters for type descriptors with lazy construction and caching
// WHY: the engine handles types it has never seen and self-referencing type graphs
// QUOTE(TZ): "register before initialize"
// REF: req-resolve-1
// SOURCE: n/a
// FORMAT THEOREM: ∀T ∈ map: resolve(T) = resolve(T) (reference equality)
// PURITY: CORE
// EFFECT: mutates the factory's own type map and instance cache
// INVARIANT: a failed resolve leaves no type-map entry it added
// COMPLEXITY: O(1) on hit, O(size of the type graph) on first resolution

export interface FactoryOptions {
  readonly types?: TypeTable
  readonly emitDiscriminator?: boolean
  readonly dateFormat?: DateFormat
}

type CerealizerClass<C extends Cerealizer> = new(...args: never[]) => C

/**
 * Central repository of every {@link Cerealizer} used by one engine.
 *
 * Holds two independent caches: the type map (descriptor → converter) and the
 * instance cache (converter class → converter).
 */
export class CerealFactory {
  readonly types: TypeTable

  private readonly map = new Map<TypeDescriptor, Cerealizer>()
  private readonly cache = new Map<unknown, Cerealizer>()
  private readonly dynamic: DynamicCerealizer
  private journal: Array<TypeDescriptor> | undefined

  constructor(options: FactoryOptions = {}) {
    this.types = options.types ?? emptyTypeTable

    const string = new StringCerealizer()
    const boolean = new BooleanCerealizer()
    const char = new CharCerealizer()
    const byte = new ByteCerealizer()
    const short = new ShortCerealizer()
    const int = new IntegerCerealizer()
    const long = new LongCerealizer()
    const float = new FloatCerealizer()
    const double = new DoubleCerealizer()
    this.map.set(Types.string, string)
    this.map.set(Types.boolean, boolean)
    this.map.set(Types.char, char)
    this.map.set(Types.byte, byte)
    this.map.set(Types.short, short)
    this.map.set(Types.int, int)
    this.map.set(Types.long, long)
    this.map.set(Types.float, float)
    this.map.set(Types.double, double)

    /* Object-typed slots go through runtime dispatch */
    this.dynamic = new DynamicCerealizer({
      emitDiscriminator: options.emitDiscriminator ?? defaultConfig.emitDiscriminator
    })
    this.map.set(Types.any, this.dynamic)

    const date = new DateCerealizer(options.dateFormat ?? defaultConfig.dateFormat)
    this.map.set(Types.date, date)

    this.cacheConverterInstances(string, boolean, char, byte, short, int, long, float, double, this.dynamic, date)

    /* Bytes are only reachable through the instance cache */
    this.cacheConverterInstance(new BytesCerealizer())
  }

  /**
   * Get the converter for a type, constructing and caching one on first use.
   *
   * @param type - Descriptor of the host type.
   * @returns The converter, or the first construction or lookup failure.
   *
   * @pure false
   * @effect registers converters in the type map
   * @invariant on Left every type-map entry added by this call is removed
   * @complexity O(1) on hit
   */
  resolve(type: TypeDescriptor): Either.Either<Cerealizer, CerealError> {
    const hit = this.map.get(type)
    if (hit !== undefined) {
      return Either.right(hit)
    }
    if (this.journal !== undefined) {
      return this.construct(type)
    }
    const journal: Array<TypeDescriptor> = []
    this.journal = journal
    let committed = false
    try {
      const result = this.construct(type)
      committed = Either.isRight(result)
      return result
    } finally {
      this.journal = undefined
      if (!committed) {
        for (const pending of journal) {
          this.map.delete(pending)
        }
      }
    }
  }

  private register(type: TypeDescriptor, cerealizer: Cerealizer): void {
    this.map.set(type, cerealizer)
    this.journal?.push(type)
  }

  private construct(type: TypeDescriptor): Either.Either<Cerealizer, CerealError> {
    const tagged = metadataTag(type)
    if (Option.isSome(tagged)) {
      return this.fromMetadataTag(tagged.value)
    }
    return Match.value(type).pipe(
      Match.when({ _tag: "Enum" }, (enumType) => Either.right(new EnumCerealizer(enumType))),
      Match.when({ _tag: "Bytes" }, () => this.cachedBytes()),
      Match.when({ _tag: "Array" }, (arrayType) => this.constructArray(arrayType)),
      Match.when({ _tag: "Collection" }, (collectionType) => this.constructCollection(collectionType)),
      Match.when({ _tag: "Map" }, (mapType) => this.constructMap(mapType)),
      Match.when({ _tag: "Class" }, (classType) => this.constructClass(classType)),
      Match.when({ _tag: "Scalar" }, (leaf) => missingLeaf(leaf)),
      Match.when({ _tag: "Temporal" }, (leaf) => missingLeaf(leaf)),
      Match.when({ _tag: "Any" }, (leaf) => missingLeaf(leaf)),
      Match.exhaustive
    )
  }

  private fromMetadataTag(cerealizerClass: ConverterClass): Either.Either<Cerealizer, CerealError> {
    const cached = this.getCachedConverterInstance(cerealizerClass)
    if (cached !== undefined) {
      return Either.right(cached)
    }
    const created = instantiateConverter(cerealizerClass)
    if (Either.isRight(created)) {
      this.cacheConverterInstance(created.right)
    }
    return created
  }

  private cachedBytes(): Either.Either<Cerealizer, CerealError> {
    const bytes = this.getCachedConverterInstance(BytesCerealizer)
    return bytes === undefined
      ? Either.left(constructionError("no byte-sequence cerealizer is cached"))
      : Either.right(bytes)
  }

  private constructArray(type: ArrayType): Either.Either<Cerealizer, CerealError> {
    return Either.map(this.resolve(type.element), (delegate) => {
      /* A self-referencing element may already have registered this array */
      const existing = this.map.get(type)
      if (existing !== undefined) {
        return existing
      }
      const cerealizer = new ArrayCerealizer(delegate, type.element)
      this.register(type, cerealizer)
      cerealizer.setCerealFactory(this)
      return cerealizer
    })
  }

  private constructCollection(type: CollectionType): Either.Either<Cerealizer, CerealError> {
    const cerealizer = new CollectionCerealizer(this.dynamic, type)
    this.register(type, cerealizer)
    cerealizer.setCerealFactory(this)
    return Either.map(cerealizer.initialize(), () => cerealizer)
  }

  private constructMap(type: MapType): Either.Either<Cerealizer, CerealError> {
    const cerealizer = new MapCerealizer(this.dynamic, type)
    this.register(type, cerealizer)
    cerealizer.setCerealFactory(this)
    return Either.map(cerealizer.initialize(), () => cerealizer)
  }

  private constructClass(type: ClassType): Either.Either<Cerealizer, CerealError> {
    if (isCerealizable(type.ctor.prototype)) {
      const cerealizer = new CerealizableCerealizer(type)
      this.register(type, cerealizer)
      cerealizer.setCerealFactory(this)
      return Either.right(cerealizer)
    }
    const cerealizer = new ClassCerealizer(type)
    /*
     * Must be in the map before initialize: field resolution of a
     * self-referencing class comes back here for the same type
     */
    this.register(type, cerealizer)
    cerealizer.setCerealFactory(this)
    return Either.map(cerealizer.initialize(), () => cerealizer)
  }

  /**
   * Read the discriminator of a generic map and look the named type up.
   *
   * @param value - Decoded generic value.
   * @returns None when the value carries no textual discriminator.
   *
   * @pure true
   * @invariant Left only when a textual discriminator names no registered type
   * @complexity O(1)
   */
  resolveRuntimeClass(value: GenericValue): Either.Either<Option.Option<TypeDescriptor>, ClassNotFound> {
    if (!isGenericMap(value) || !Object.hasOwn(value, DISCRIMINATOR_KEY)) {
      return Either.right(Option.none())
    }
    const name = value[DISCRIMINATOR_KEY]
    if (typeof name !== "string") {
      return Either.right(Option.none())
    }
    return Option.match(this.types.lookup(name), {
      onNone: () => Either.left(classNotFound(name)),
      onSome: (type) => Either.right(Option.some<TypeDescriptor>(type))
    })
  }

  getRuntimeConverter(value: GenericValue, fallback: Cerealizer): Either.Either<Cerealizer, CerealError> {
    return Either.flatMap(this.resolveRuntimeClass(value), (runtime) =>
      Option.match(runtime, {
        onNone: (): Either.Either<Cerealizer, CerealError> => Either.right(fallback),
        onSome: (type) => this.resolve(type)
      }))
  }

  /** Use `cerealizer` for `type` from now on, whatever `type` would classify as. */
  registerConverter(type: TypeDescriptor, cerealizer: Cerealizer): void {
    this.map.set(type, cerealizer)
  }

  cacheConverterInstance(cerealizer: Cerealizer): void {
    if (isFactoryAware(cerealizer)) {
      cerealizer.setCerealFactory(this)
    }
    this.cache.set(cerealizer.constructor, cerealizer)
  }

  cacheConverterInstances(...cerealizers: ReadonlyArray<Cerealizer>): void {
    for (const cerealizer of cerealizers) {
      this.cacheConverterInstance(cerealizer)
    }
  }

  getCachedConverterInstance<C extends Cerealizer>(type: CerealizerClass<C>): C | undefined {
    const cached = this.cache.get(type)
    return cached instanceof type ? cached : undefined
  }

  getDynamicCerealizer(): Cerealizer {
    return this.dynamic
  }
}

const metadataTag = (type: TypeDescriptor): Option.Option<ConverterClass> =>
  type._tag === "Class" || type._tag === "Enum" ? Option.fromNullable(type.cerealizer) : Option.none()

const instantiateConverter = (cerealizerClass: ConverterClass): Either.Either<Cerealizer, CerealError> => {
  try {
    return Either.right(new cerealizerClass())
  } catch (cause) {
    return Either.left(constructionError(`failed to create cerealizer ${cerealizerClass.name}`, cause))
  }
}

const missingLeaf = (type: TypeDescriptor): Either.Either<Cerealizer, CerealError> =>
  Either.left(constructionError(`no cerealizer registered for ${type.name}`))
