/**
 * Aggregate delegation: path access on classes declared with @field.
 *
 * Each level consumes exactly one segment and hands the rest to the
 * accessor of the named field's type, so depth N works because depth 1 does.
 */

import { getFields, type FieldMeta } from "./decorators.ts";
import {
  CantSerializeError,
  TypeMismatchError,
  UnknownFieldError,
  ValidationError,
} from "./errors.ts";
import { splitKey, toPath, type KeySequence, type Path } from "./path.ts";
import { primitives } from "./primitives.ts";
import type { Accessor, FieldType, KeyOptions } from "./types.ts";
import type { Value } from "./value.ts";

const accessorCache = new WeakMap<Function, StructAccessor<object>>();

export class StructAccessor<T extends object> implements Accessor<T> {
  readonly typeName: string;
  readonly validFields: readonly string[];
  readonly #cls: Function;
  readonly #fields: readonly FieldMeta[];

  constructor(cls: Function, fields: readonly FieldMeta[]) {
    this.typeName = cls.name;
    this.#cls = cls;
    this.#fields = fields;
    this.validFields = Object.freeze(fields.map((f) => f.name));
  }

  is(target: unknown): target is T {
    return (
      typeof target === "object" &&
      target !== null &&
      target instanceof this.#cls
    );
  }

  getValue(target: T, path: Path): Value {
    const [head, ...rest] = path;
    if (head === undefined) {
      throw new CantSerializeError(this.typeName);
    }
    const meta = this.#lookup(head);
    const { accessor, current } = readField(target, meta);
    return accessor.getValue(current, rest);
  }

  setValue(target: T, path: Path, value: Value): T {
    const [head, ...rest] = path;
    if (head === undefined) {
      // A scalar can never replace a whole aggregate.
      throw new TypeMismatchError(this.typeName, value.type);
    }
    const meta = this.#lookup(head);
    const { accessor, current } = readField(target, meta);
    const next = accessor.setValue(current, rest, value);
    validateField(meta, next);
    if (!Object.is(next, current) && !Reflect.set(target, meta.name, next)) {
      throw new TypeError(
        `Cannot write field "${meta.name}" of ${this.typeName}: it is read-only or the object is frozen`,
      );
    }
    return target;
  }

  #lookup(segment: string): FieldMeta {
    for (const meta of this.#fields) {
      if (meta.name === segment) return meta;
    }
    throw new UnknownFieldError(segment, this.validFields);
  }
}

/**
 * Read a field and pick the accessor for what it holds. A struct field is
 * walked with the accessor of the instance's own class, so a subclass
 * stored in a base-typed field exposes the same fields it does as a root.
 */
function readField(
  target: object,
  meta: FieldMeta,
): { accessor: Accessor<unknown>; current: unknown } {
  const declared = accessorForType(meta.type);
  const current: unknown = Reflect.get(target, meta.name);
  if (!declared.is(current)) {
    throw new TypeMismatchError(declared.typeName, describeNative(current));
  }
  const accessor =
    typeof current === "object" && current !== null
      ? accessorFor(current.constructor)
      : declared;
  return { accessor, current };
}

function describeNative(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

function validateField(meta: FieldMeta, next: unknown): void {
  if (meta.schemas.length === 0) return;
  const issues: { message: string; path?: ReadonlyArray<PropertyKey> }[] = [];
  for (const schema of meta.schemas) {
    const result = schema["~standard"].validate(next);
    if (result instanceof Promise) {
      throw new Error(
        `Validator on field "${meta.name}" is async; path access is synchronous`,
      );
    }
    if (result.issues) {
      for (const issue of result.issues) {
        issues.push({
          message: `${meta.name}: ${issue.message}`,
          path: [meta.name],
        });
      }
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
}

// -- Accessor lookup --

/**
 * The accessor generated from `cls`'s @field declarations. Classes with no
 * fields have none.
 */
export function accessorFor(cls: Function): StructAccessor<object> {
  let accessor = accessorCache.get(cls);
  if (!accessor) {
    const fields = getFields(cls);
    if (fields.length === 0) {
      throw new Error(`${cls.name || "(anonymous)"} declares no @field members`);
    }
    accessor = new StructAccessor(cls, fields);
    accessorCache.set(cls, accessor);
  }
  return accessor;
}

export function accessorForType(type: FieldType): Accessor<unknown> {
  return typeof type === "string" ? primitives[type] : accessorFor(type);
}

// -- Entry points --

export function getValue(target: object, keys: KeySequence): Value {
  return accessorFor(target.constructor).getValue(target, toPath(keys));
}

export function setValue(
  target: object,
  keys: KeySequence,
  value: Value,
): void {
  accessorFor(target.constructor).setValue(target, toPath(keys), value);
}

export function get(target: object, key: string, options: KeyOptions = {}): Value {
  return getValue(target, splitKey(key, options.delimiter));
}

export function set(
  target: object,
  key: string,
  value: Value,
  options: KeyOptions = {},
): void {
  setValue(target, splitKey(key, options.delimiter), value);
}

export function typeName(target: object): string {
  return accessorFor(target.constructor).typeName;
}
