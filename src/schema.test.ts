import { expect, test } from "vitest";
import { field } from "./decorators.ts";
import { buildSchema } from "./schema.ts";

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

test("buildSchema creates indexed schema from class metadata", () => {
  const { schema, classIndex } = buildSchema(Outer);

  expect(classIndex.get(Outer)).toBe(0);
  expect(classIndex.get(Inner)).toBe(1);
  expect(classIndex.get(KeyValue)).toBe(2);

  expect(schema).toEqual([
    { name: "Outer", fields: { inner: 1 } },
    { name: "Inner", fields: { x: "double", y: "integer", key_value_pair: 2 } },
    { name: "KeyValue", fields: { key: "string", value: "string" } },
  ]);
});

test("field order follows declaration order", () => {
  const { schema } = buildSchema(Inner);
  expect(Object.keys(schema[0]?.fields ?? {})).toEqual([
    "x",
    "y",
    "key_value_pair",
  ]);
});

test("a type used by several fields is registered once", () => {
  class Point {
    @field("double")
    x = 0;
  }

  class Segment {
    @field(Point)
    from = new Point();

    @field(Point)
    to = new Point();
  }

  const { schema, classIndex } = buildSchema(Segment);
  expect(schema.length).toBe(2);
  expect(classIndex.get(Point)).toBe(1);
  expect(schema[0]).toEqual({ name: "Segment", fields: { from: 1, to: 1 } });
});

test("buildSchema handles cycles", () => {
  class Chain {
    @field("integer")
    n = 0n;

    @field(Chain)
    next: Chain | null = null;
  }

  const { schema, classIndex } = buildSchema(Chain);
  expect(classIndex.get(Chain)).toBe(0);
  expect(schema).toEqual([{ name: "Chain", fields: { n: "integer", next: 0 } }]);
});
