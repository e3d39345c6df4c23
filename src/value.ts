/**
 * Value — the dynamic representation that crosses the static/dynamic boundary.
 *
 * A closed tagged union over the supported primitive kinds. Adding a kind
 * means adding a variant here and a case to every switch over `type`; the
 * compiler flags the ones that were missed.
 */

export const INTEGER_TYPE = "integer";
export const DOUBLE_TYPE = "double";
export const STRING_TYPE = "string";

export type DataType = typeof INTEGER_TYPE | typeof DOUBLE_TYPE | typeof STRING_TYPE;

export const DATA_TYPES: readonly DataType[] = [
  INTEGER_TYPE,
  DOUBLE_TYPE,
  STRING_TYPE,
];

export type IntegerValue = { readonly type: typeof INTEGER_TYPE; readonly value: bigint };
export type DoubleValue = { readonly type: typeof DOUBLE_TYPE; readonly value: number };
export type StringValue = { readonly type: typeof STRING_TYPE; readonly value: string };

export type Value = IntegerValue | DoubleValue | StringValue;

/** Native type carried by each variant. */
export type NativeOf<D extends DataType> = Extract<Value, { type: D }>["value"];

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

function integer(value: bigint | number): IntegerValue {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`${value} is not a safe integer`);
    }
    value = BigInt(value);
  }
  if (value < I64_MIN || value > I64_MAX) {
    throw new RangeError(`${value} does not fit in a signed 64-bit integer`);
  }
  return { type: INTEGER_TYPE, value };
}

function double(value: number): DoubleValue {
  return { type: DOUBLE_TYPE, value };
}

function string(value: string): StringValue {
  return { type: STRING_TYPE, value };
}

export const Value = { integer, double, string } as const;

export function isDataType(name: unknown): name is DataType {
  return name === INTEGER_TYPE || name === DOUBLE_TYPE || name === STRING_TYPE;
}

export function dataType(value: Value): DataType {
  return value.type;
}

/**
 * Wrap a native primitive: bigint → integer, number → double, string → string.
 */
export function valueFrom(native: bigint): IntegerValue;
export function valueFrom(native: number): DoubleValue;
export function valueFrom(native: string): StringValue;
export function valueFrom(native: bigint | number | string): Value;
export function valueFrom(native: bigint | number | string): Value {
  if (typeof native === "bigint") return integer(native);
  if (typeof native === "number") return double(native);
  return string(native);
}

export function valuesEqual(a: Value, b: Value): boolean {
  return a.type === b.type && a.value === b.value;
}
