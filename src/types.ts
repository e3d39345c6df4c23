/**
 * The accessor contract and the types shared by its implementations.
 */

import type { Path } from "./path.ts";
import type { DataType, Value } from "./value.ts";

/**
 * Get/set by path for values of type `T`.
 *
 * `setValue` returns what the owner of `target` must store afterwards: the
 * new native for a primitive, `target` itself for an aggregate (which is
 * mutated in place). Nothing is written when it throws.
 */
export interface Accessor<T> {
  readonly typeName: string;
  is(target: unknown): target is T;
  getValue(target: T, path: Path): Value;
  setValue(target: T, path: Path, value: Value): T;
}

export type Constructor<T extends object = object> = abstract new (
  ...args: never[]
) => T;

/** What a `@field` may hold: a primitive tag or a class with fields of its own. */
export type FieldType = DataType | Constructor;

export interface KeyOptions {
  /** Segment separator for dotted keys. Defaults to ".". */
  delimiter?: string;
}
