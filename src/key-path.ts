/**
 * keyPath(cls) — a Standard Schema that checks a dotted key against a
 * class's field declarations without needing an instance.
 *
 * Validates that every segment names a field and that the key ends exactly
 * at a primitive leaf. The output is the split path.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { formatPath } from "./format.ts";
import { splitKey, type Path } from "./path.ts";
import { buildSchema } from "./schema.ts";
import type { KeyOptions } from "./types.ts";

const MAX_PATH_DEPTH = 64;

type Issue = StandardSchemaV1.Issue;

export function keyPath(
  cls: Function,
  options: KeyOptions = {},
): StandardSchemaV1<string, Path> {
  return {
    "~standard": {
      version: 1,
      vendor: "fieldpath",
      validate(input: unknown) {
        if (typeof input !== "string") {
          return { issues: [{ message: "Expected a dotted key string" }] };
        }

        const segments = splitKey(input, options.delimiter);
        if (segments.length > MAX_PATH_DEPTH) {
          return {
            issues: [
              {
                message: `Path exceeds maximum depth of ${MAX_PATH_DEPTH} segments`,
              },
            ],
          };
        }

        const issue = walk(cls, segments);
        return issue ? { issues: [issue] } : { value: segments };
      },
    },
  };
}

function walk(cls: Function, segments: Path): Issue | undefined {
  const { schema } = buildSchema(cls);
  let typeIndex = 0;

  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i] ?? "";
    const consumed = segments.slice(0, i);
    const node = schema[typeIndex];
    if (!node) {
      return { message: `Invalid path at ${JSON.stringify(seg)}`, path: consumed };
    }

    const next = Object.hasOwn(node.fields, seg) ? node.fields[seg] : undefined;
    if (next === undefined) {
      return {
        message: `${JSON.stringify(seg)} is not a field of ${node.name} (expected one of: ${Object.keys(node.fields).join(", ")})`,
        path: consumed,
      };
    }

    if (typeof next === "string") {
      const remaining = segments.length - i - 1;
      if (remaining > 0) {
        const leaf = segments.slice(0, i + 1);
        return {
          message: `${formatPath(leaf)} is a ${next} leaf; ${remaining} key${remaining === 1 ? "" : "s"} remaining`,
          path: leaf,
        };
      }
      return undefined;
    }
    typeIndex = next;
  }

  const node = schema[typeIndex];
  return {
    message: `${formatPath(segments)} resolves to ${node?.name ?? "an aggregate"}, which has no scalar value`,
    path: segments,
  };
}
