import type { ConverterClass } from "./cerealizer.js"

// CHANGE: model host types as explicit descriptor values compared by identity
// WHY: resolution needs map keys for types that have no runtime representation
// QUOTE(TZ): "equality and hashing by identity of the type, not by value"
// REF: req-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: arrayOf(t) = arrayOf(t) (reference equality)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: derived descriptors are interned per parameter
// COMPLEXITY: O(1)/O(1)

export type ScalarKind =
  | "string"
  | "boolean"
  | "char"
  | "byte"
  | "short"
  | "int"
  | "long"
  | "float"
  | "double"

export interface ScalarType {
  readonly _tag: "Scalar"
  readonly name: string
  readonly kind: ScalarKind
}

export interface TemporalType {
  readonly _tag: "Temporal"
  readonly name: "Date"
}

export interface BytesType {
  readonly _tag: "Bytes"
  readonly name: "Uint8Array"
}

export interface AnyType {
  readonly _tag: "Any"
  readonly name: "Object"
}

export interface EnumType {
  readonly _tag: "Enum"
  readonly name: string
  readonly members: ReadonlyArray<string>
  readonly cerealizer: ConverterClass | undefined
}

export interface ArrayType {
  readonly _tag: "Array"
  readonly name: string
  readonly element: TypeDescriptor
}

export type CollectionKind = "list" | "set"

export interface CollectionType {
  readonly _tag: "Collection"
  readonly name: string
  readonly kind: CollectionKind
  readonly element: TypeDescriptor | undefined
}

export type MapKind = "record" | "map"

export interface MapType {
  readonly _tag: "Map"
  readonly name: string
  readonly kind: MapKind
  readonly value: TypeDescriptor | undefined
}

export interface FieldDescriptor {
  readonly type: TypeDescriptor
  readonly required?: boolean
}

export type FieldMap = Readonly<Record<string, TypeDescriptor | FieldDescriptor>>

export interface ClassType<A extends object = object> {
  readonly _tag: "Class"
  readonly name: string
  readonly ctor: new () => A
  readonly fields: () => FieldMap
  readonly cerealizer: ConverterClass | undefined
}

export type TypeDescriptor =
  | ScalarType
  | TemporalType
  | BytesType
  | AnyType
  | EnumType
  | ArrayType
  | CollectionType
  | MapType
  | ClassType

export type NamedType = EnumType | ClassType

const scalar = (kind: ScalarKind): ScalarType => ({ _tag: "Scalar", name: kind, kind })

export const Types = {
  string: scalar("string"),
  boolean: scalar("boolean"),
  char: scalar("char"),
  byte: scalar("byte"),
  short: scalar("short"),
  int: scalar("int"),
  long: scalar("long"),
  float: scalar("float"),
  double: scalar("double"),
  date: { _tag: "Temporal", name: "Date" } satisfies TemporalType,
  bytes: { _tag: "Bytes", name: "Uint8Array" } satisfies BytesType,
  any: { _tag: "Any", name: "Object" } satisfies AnyType
} as const

const arrays = new WeakMap<TypeDescriptor, ArrayType>()
const collections = new WeakMap<TypeDescriptor, Record<CollectionKind, CollectionType>>()
const maps = new WeakMap<TypeDescriptor, Record<MapKind, MapType>>()

const untypedCollections: Record<CollectionKind, CollectionType> = {
  list: { _tag: "Collection", name: "Array", kind: "list", element: undefined },
  set: { _tag: "Collection", name: "Set", kind: "set", element: undefined }
}

const untypedMaps: Record<MapKind, MapType> = {
  record: { _tag: "Map", name: "Record", kind: "record", value: undefined },
  map: { _tag: "Map", name: "Map", kind: "map", value: undefined }
}

export const UntypedTypes = {
  list: untypedCollections.list,
  set: untypedCollections.set,
  record: untypedMaps.record,
  map: untypedMaps.map
} as const

/**
 * Interned array descriptor for an element type.
 *
 * @param element - Declared element type.
 * @returns The same descriptor for the same element; `Types.bytes` for bytes.
 *
 * @pure true
 * @invariant arrayOf(Types.byte) === Types.bytes
 * @complexity O(1)
 */
export const arrayOf = (element: TypeDescriptor): ArrayType | BytesType => {
  if (element === Types.byte) {
    return Types.bytes
  }
  const cached = arrays.get(element)
  if (cached !== undefined) {
    return cached
  }
  const created: ArrayType = { _tag: "Array", name: `${element.name}[]`, element }
  arrays.set(element, created)
  return created
}

const collectionOf = (kind: CollectionKind, element: TypeDescriptor): CollectionType => {
  const existing = collections.get(element)
  if (existing !== undefined) {
    return existing[kind]
  }
  const created: Record<CollectionKind, CollectionType> = {
    list: { _tag: "Collection", name: `Array<${element.name}>`, kind: "list", element },
    set: { _tag: "Collection", name: `Set<${element.name}>`, kind: "set", element }
  }
  collections.set(element, created)
  return created[kind]
}

export const listOf = (element: TypeDescriptor): CollectionType => collectionOf("list", element)

export const setOf = (element: TypeDescriptor): CollectionType => collectionOf("set", element)

const mapTypeOf = (kind: MapKind, value: TypeDescriptor): MapType => {
  const existing = maps.get(value)
  if (existing !== undefined) {
    return existing[kind]
  }
  const created: Record<MapKind, MapType> = {
    record: { _tag: "Map", name: `Record<string, ${value.name}>`, kind: "record", value },
    map: { _tag: "Map", name: `Map<string, ${value.name}>`, kind: "map", value }
  }
  maps.set(value, created)
  return created[kind]
}

export const recordOf = (value: TypeDescriptor): MapType => mapTypeOf("record", value)

export const mapOf = (value: TypeDescriptor): MapType => mapTypeOf("map", value)

export interface EnumOptions {
  readonly cerealizer?: ConverterClass
}

export const enumType = (
  name: string,
  members: ReadonlyArray<string> | Readonly<Record<string, string>>,
  options: EnumOptions = {}
): EnumType => ({
  _tag: "Enum",
  name,
  members: Object.values(members),
  cerealizer: options.cerealizer
})

export interface ClassOptions<A extends object> {
  readonly name: string
  readonly ctor: new () => A
  readonly fields?: () => FieldMap
  readonly cerealizer?: ConverterClass
}

const noFields = (): FieldMap => ({})

export const classType = <A extends object>(options: ClassOptions<A>): ClassType<A> => ({
  _tag: "Class",
  name: options.name,
  ctor: options.ctor,
  fields: options.fields ?? noFields,
  cerealizer: options.cerealizer
})

export const field = (type: TypeDescriptor, options: { readonly required?: boolean } = {}): FieldDescriptor =>
  options.required === undefined ? { type } : { type, required: options.required }

export const isFieldDescriptor = (value: TypeDescriptor | FieldDescriptor): value is FieldDescriptor =>
  !("_tag" in value)
