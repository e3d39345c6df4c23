import type { StandardSchemaV1 } from "@standard-schema/spec";
import { describe, expect, test } from "vitest";
import { field } from "./decorators.ts";
import { keyPath } from "./key-path.ts";
import type { Path } from "./path.ts";

class KeyValue {
  @field("string")
  key = "Key";

  @field("string")
  value = "Value";
}

class Inner {
  @field("double")
  x = 3.14;

  @field("integer")
  y = 42n;

  @field(KeyValue)
  key_value_pair = new KeyValue();
}

class Outer {
  @field(Inner)
  inner = new Inner();
}

function validate(
  schema: StandardSchemaV1<string, Path>,
  input: unknown,
): StandardSchemaV1.Result<Path> {
  const result = schema["~standard"].validate(input);
  if (result instanceof Promise) throw new Error("expected a sync result");
  return result;
}

describe("keyPath", () => {
  const schema = keyPath(Outer);

  test("identifies itself as a Standard Schema", () => {
    expect(schema["~standard"].version).toBe(1);
    expect(schema["~standard"].vendor).toBe("fieldpath");
  });

  test("accepts a key ending at a leaf and outputs the segments", () => {
    expect(validate(schema, "inner.y")).toEqual({ value: ["inner", "y"] });
    expect(validate(schema, "inner.key_value_pair.value")).toEqual({
      value: ["inner", "key_value_pair", "value"],
    });
  });

  test("rejects non-string input", () => {
    expect(validate(schema, 42)).toEqual({
      issues: [{ message: "Expected a dotted key string" }],
    });
  });

  test("rejects an unknown field with the valid alternatives", () => {
    expect(validate(schema, "inner.z")).toEqual({
      issues: [
        {
          message:
            '"z" is not a field of Inner (expected one of: x, y, key_value_pair)',
          path: ["inner"],
        },
      ],
    });
  });

  test("inherited object members are not fields", () => {
    expect(validate(schema, "constructor")).toEqual({
      issues: [
        {
          message: '"constructor" is not a field of Outer (expected one of: inner)',
          path: [],
        },
      ],
    });
  });

  test("rejects keys that continue past a leaf", () => {
    expect(validate(schema, "inner.x.a.b")).toEqual({
      issues: [
        {
          message: "root.inner.x is a double leaf; 2 keys remaining",
          path: ["inner", "x"],
        },
      ],
    });
    expect(validate(schema, "inner.y.a")).toEqual({
      issues: [
        {
          message: "root.inner.y is a integer leaf; 1 key remaining",
          path: ["inner", "y"],
        },
      ],
    });
  });

  test("rejects keys that stop at an aggregate", () => {
    expect(validate(schema, "inner.key_value_pair")).toEqual({
      issues: [
        {
          message:
            "root.inner.key_value_pair resolves to KeyValue, which has no scalar value",
          path: ["inner", "key_value_pair"],
        },
      ],
    });
  });

  test("an empty key is an unknown field", () => {
    expect(validate(schema, "")).toEqual({
      issues: [
        {
          message: '"" is not a field of Outer (expected one of: inner)',
          path: [],
        },
      ],
    });
  });

  test("rejects overly deep keys", () => {
    const deep = Array.from({ length: 65 }, () => "inner").join(".");
    expect(validate(schema, deep)).toEqual({
      issues: [{ message: "Path exceeds maximum depth of 64 segments" }],
    });
  });

  test("honours the delimiter option", () => {
    const slashed = keyPath(Outer, { delimiter: "/" });
    expect(validate(slashed, "inner/x")).toEqual({ value: ["inner", "x"] });
  });
});
