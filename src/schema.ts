/**
 * Build the indexed Schema array from class metadata.
 * Walks @field types recursively — no instance probing needed.
 */

import { getFields } from "./decorators.ts";
import type { DataType } from "./value.ts";

export interface StructSchema {
  name: string;
  /** Field name → primitive tag, or index of a nested struct. */
  fields: Record<string, DataType | number>;
}

export type Schema = StructSchema[];

export interface SchemaResult {
  schema: Schema;
  classIndex: Map<Function, number>;
}

/**
 * Build a Schema starting from a root class.
 * Walks FieldMeta.type recursively, handling cycles via classIndex.
 * Returns the indexed schema array and a map from constructor → index.
 */
export function buildSchema(rootClass: Function): SchemaResult {
  const schema: Schema = [];
  const classIndex = new Map<Function, number>();

  function register(cls: Function): number {
    const existing = classIndex.get(cls);
    if (existing !== undefined) return existing;

    // Reserve index before walking children (handles cycles)
    const index = schema.length;
    classIndex.set(cls, index);
    schema.push({ name: cls.name, fields: {} }); // placeholder

    const fields: Record<string, DataType | number> = {};
    for (const meta of getFields(cls)) {
      fields[meta.name] =
        typeof meta.type === "string" ? meta.type : register(meta.type);
    }

    schema[index] = { name: cls.name, fields };
    return index;
  }

  register(rootClass);
  return { schema, classIndex };
}
