// Decorators
export { field, getFields } from "./decorators.ts";
export type { FieldMeta } from "./decorators.ts";

// Values
export {
  Value,
  INTEGER_TYPE,
  DOUBLE_TYPE,
  STRING_TYPE,
  DATA_TYPES,
  dataType,
  isDataType,
  valueFrom,
  valuesEqual,
} from "./value.ts";
export type {
  DataType,
  NativeOf,
  IntegerValue,
  DoubleValue,
  StringValue,
} from "./value.ts";

// Path utilities
export {
  type Path,
  type KeySequence,
  toPath,
  splitKey,
  DEFAULT_DELIMITER,
} from "./path.ts";

// Access
export {
  get,
  set,
  getValue,
  setValue,
  typeName,
  accessorFor,
  accessorForType,
  StructAccessor,
} from "./access.ts";
export { Primitive, primitives } from "./primitives.ts";
export { Struct } from "./struct.ts";

// Reflection
export { buildSchema } from "./schema.ts";
export type { Schema, StructSchema, SchemaResult } from "./schema.ts";
export { keyPath } from "./key-path.ts";

// Formatting
export { formatPath, formatSegment, formatValue } from "./format.ts";

// Errors
export {
  AccessError,
  TypeMismatchError,
  TooManyKeysError,
  UnknownFieldError,
  CantSerializeError,
  ValidationError,
  isAccessError,
} from "./errors.ts";

// Types
export type { Accessor, Constructor, FieldType, KeyOptions } from "./types.ts";
