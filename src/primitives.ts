/**
 * Terminal case of the accessor recursion: the supported primitive kinds.
 */

import { TooManyKeysError, TypeMismatchError } from "./errors.ts";
import type { Path } from "./path.ts";
import type { Accessor } from "./types.ts";
import {
  DOUBLE_TYPE,
  INTEGER_TYPE,
  STRING_TYPE,
  Value,
  type DataType,
  type NativeOf,
} from "./value.ts";

export class Primitive<D extends DataType> implements Accessor<NativeOf<D>> {
  constructor(
    readonly typeName: D,
    private readonly wrap: (native: NativeOf<D>) => Value,
  ) {}

  is(target: unknown): target is NativeOf<D> {
    return typeof target === nativeKind(this.typeName);
  }

  getValue(target: NativeOf<D>, path: Path): Value {
    checkExhausted(path);
    return this.wrap(target);
  }

  setValue(_target: NativeOf<D>, path: Path, value: Value): NativeOf<D> {
    checkExhausted(path);
    if (!this.#accepts(value)) {
      throw new TypeMismatchError(this.typeName, value.type);
    }
    return value.value;
  }

  #accepts(value: Value): value is Extract<Value, { type: D }> {
    return value.type === this.typeName;
  }
}

function checkExhausted(path: Path): void {
  if (path.length > 0) {
    throw new TooManyKeysError(path.length);
  }
}

export function nativeKind(type: DataType): "bigint" | "number" | "string" {
  switch (type) {
    case INTEGER_TYPE:
      return "bigint";
    case DOUBLE_TYPE:
      return "number";
    case STRING_TYPE:
      return "string";
  }
}

export const primitives: { readonly [D in DataType]: Primitive<D> } = {
  integer: new Primitive(INTEGER_TYPE, Value.integer),
  double: new Primitive(DOUBLE_TYPE, Value.double),
  string: new Primitive(STRING_TYPE, Value.string),
};
