export type { Cerealizable, Cerealizer, ConverterClass, FactoryAware, Slot } from "./core/cerealizer.js"
export { fromGenericSlot, isCerealizable, isFactoryAware, toGenericSlot } from "./core/cerealizer.js"
export type { DateFormat, EngineOptions, FileConfig, LogLevelName, ResolvedConfig } from "./core/config.js"
export { defaultConfig, resolveConfig } from "./core/config.js"
export { ArrayCerealizer } from "./core/converters/array.js"
export { BytesCerealizer } from "./core/converters/bytes.js"
export { CerealizableCerealizer } from "./core/converters/cerealizable.js"
export { ClassCerealizer } from "./core/converters/class.js"
export { CollectionCerealizer } from "./core/converters/collection.js"
export type { DynamicOptions } from "./core/converters/dynamic.js"
export { DynamicCerealizer } from "./core/converters/dynamic.js"
export { EnumCerealizer } from "./core/converters/enum.js"
export { MapCerealizer } from "./core/converters/map.js"
export {
  BooleanCerealizer,
  ByteCerealizer,
  CharCerealizer,
  DoubleCerealizer,
  FloatCerealizer,
  IntegerCerealizer,
  LongCerealizer,
  ShortCerealizer,
  StringCerealizer
} from "./core/converters/scalar.js"
export { DateCerealizer } from "./core/converters/temporal.js"
export type {
  AppError,
  CerealError,
  ClassNotFound,
  ConfigError,
  ConstructionError,
  ConversionError,
  ConversionErrorKind,
  FileError,
  PathSegment,
  TypeTableError
} from "./core/errors.js"
export {
  atPath,
  classNotFound,
  constructionError,
  malformedScalar,
  missingField,
  renderError,
  typeMismatch
} from "./core/errors.js"
export type { FactoryOptions } from "./core/factory.js"
export { CerealFactory } from "./core/factory.js"
export type { GenericMap, GenericValue } from "./core/generic.js"
export { DISCRIMINATOR_KEY, isGenericArray, isGenericMap } from "./core/generic.js"
export type {
  AnyType,
  ArrayType,
  BytesType,
  ClassOptions,
  ClassType,
  CollectionKind,
  CollectionType,
  EnumType,
  FieldDescriptor,
  FieldMap,
  MapKind,
  MapType,
  NamedType,
  ScalarKind,
  ScalarType,
  TemporalType,
  TypeDescriptor
} from "./core/type-descriptor.js"
export {
  arrayOf,
  classType,
  enumType,
  field,
  listOf,
  mapOf,
  recordOf,
  setOf,
  Types,
  UntypedTypes
} from "./core/type-descriptor.js"
export type { TypeTable } from "./core/type-table.js"
export { emptyTypeTable, makeTypeTable } from "./core/type-table.js"
export { decodeConfig, defaultConfigPath, loadConfigFile } from "./shell/config-file.js"
export type { CerealEngineService } from "./shell/engine.js"
export {
  CerealEngine,
  cerealize,
  decerealize,
  decerealizeAs,
  decerealizeRuntime,
  loadEngineLayer,
  makeEngineLayer
} from "./shell/engine.js"
