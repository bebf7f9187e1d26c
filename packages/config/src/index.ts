export { ArgsSource, parseProperties } from "./adapters/args/args-source"
export { type DotenvSourceOptions, loadDotenvSource } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export type { FileSourceOptions } from "./adapters/file"
export { type JsonSourceOptions, loadJsonSource } from "./adapters/json/json-source"
export {
  MapSource,
  type MapSourceEntries,
  type PropertyValue,
} from "./adapters/map/map-source"
export { RandomSource, type RandomKind, randomKinds } from "./adapters/random/random-source"
export {
  type AddSourceOptions,
  Environment,
  EnvironmentBuilder,
  type EnvironmentOptions,
  OVERRIDES_SOURCE,
  type RegisteredSource,
  type SourceRegistration,
  SourcePriority,
} from "./core/environment"
export {
  CircularReferenceError,
  ConfigError,
  type ConfigErrorCode,
  InvalidKeyError,
  InvalidPlaceholderError,
  isConfigError,
  MissingFieldError,
  NotFoundError,
  ParseError,
  SourceLoadError,
  UnknownVariantError,
} from "./core/errors"
export {
  childKey,
  compareKeys,
  fromEnvVar,
  isPrefixOf,
  keyEquals,
  keyOf,
  parentKey,
  parseKey,
  toDotted,
  toEnvVar,
} from "./core/key"
export {
  APP_CONF_DIR,
  APP_CONF_NAME,
  APP_PROFILE,
  type LoadEnvironmentOptions,
  loadEnvironment,
} from "./core/load-environment"
export {
  type FieldOptions,
  field,
  isNonEmpty,
  list,
  type NonEmptyArray,
  nonEmpty,
  optional,
  record,
  set,
  type StructFields,
  type StructOptions,
  type StructValue,
  struct,
  toSnakeCase,
} from "./core/mapping/combinators"
export type { PropertyView } from "./core/mapping/context"
export {
  bigint,
  bool,
  duration,
  enumeration,
  float,
  type IntegerRange,
  int,
  type LeafParser,
  leaf,
  schema,
  string,
} from "./core/mapping/leaves"
export {
  PlaceholderResolver,
  type PropertyLookup,
} from "./core/placeholder/placeholder-resolver"
export type { Key, KeySegment } from "./ports/key"
export type {
  DescribeContext,
  FieldDescriptor,
  FieldSpec,
  KeyDescription,
  Mapper,
  MappingContext,
} from "./ports/mapper"
export type { PropertySource, RawProperty } from "./ports/property-source"
