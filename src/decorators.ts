/**
 * Legacy TypeScript decorators: @field
 *
 * Property decorators under `experimentalDecorators` receive
 * (prototype, propertyKey) and run in declaration order, which is the
 * order fields are matched against path segments.
 *
 * Metadata is stored via WeakMaps keyed by constructor identity.
 * Validators use Standard Schema (https://standardschema.dev/).
 *
 * @field(type) — first arg is a primitive tag or a class with fields.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { FieldType } from "./types.ts";
import { isDataType } from "./value.ts";

export interface FieldMeta {
  name: string;
  type: FieldType;
  schemas: StandardSchemaV1[];
}

// -- Metadata storage (WeakMap keyed by constructor) --

const fieldsMap = new WeakMap<Function, Map<string, FieldMeta>>();
const collectCache = new WeakMap<Function, readonly FieldMeta[]>();

function getOrCreate(ctor: Function): Map<string, FieldMeta> {
  let map = fieldsMap.get(ctor);
  if (!map) {
    map = new Map();
    fieldsMap.set(ctor, map);
  }
  return map;
}

/**
 * Fields of `cls` in declaration order, base classes first. A subclass that
 * redeclares a name keeps the base's position.
 */
export function getFields(cls: Function): readonly FieldMeta[] {
  const cached = collectCache.get(cls);
  if (cached) return cached;

  const chain: Function[] = [];
  let current: unknown = cls;
  while (typeof current === "function" && current !== Function.prototype) {
    chain.unshift(current);
    current = Object.getPrototypeOf(current);
  }

  const merged = new Map<string, FieldMeta>();
  for (const ctor of chain) {
    const own = fieldsMap.get(ctor);
    if (!own) continue;
    for (const [name, meta] of own) merged.set(name, meta);
  }

  const result = Object.freeze([...merged.values()]);
  collectCache.set(cls, result);
  return result;
}

// -- Helpers --

function isStandardSchema(v: unknown): v is StandardSchemaV1 {
  return (
    typeof v === "object" &&
    v !== null &&
    "~standard" in v &&
    typeof v["~standard"] === "object"
  );
}

function isFieldType(v: unknown): v is FieldType {
  return isDataType(v) || typeof v === "function";
}

function describe(type: FieldType): string {
  return typeof type === "string" ? type : type.name;
}

// -- @field decorator --

/**
 * @field(type, ...schemas) — exposes a property to path access.
 *
 * Usage:
 *   @field("integer") y = 42n;
 *   @field(Inner) inner = new Inner();
 *   @field("string", z.string().min(1)) name = "x";
 */
export function field(type: FieldType, ...schemas: StandardSchemaV1[]) {
  if (!isFieldType(type)) {
    throw new Error(
      `@field requires a primitive type ("integer", "double", "string") or a class, got ${String(type)}`,
    );
  }
  if (!schemas.every(isStandardSchema)) {
    throw new Error("@field validators must implement Standard Schema");
  }
  if (schemas.length > 0 && typeof type === "function") {
    throw new Error(
      `@field validators only apply to primitive fields, not ${describe(type)}`,
    );
  }
  return (target: object, propertyKey: string) => {
    getOrCreate(target.constructor).set(propertyKey, {
      name: propertyKey,
      type,
      schemas,
    });
  };
}
