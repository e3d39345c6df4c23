/**
 * Benchmark: updating a nested leaf by key vs static assignment vs a JSON
 * round trip.
 *
 * Run: npm run bench
 */

import { bench, describe } from "vitest";
import { set } from "./access.ts";
import { field } from "./decorators.ts";
import { Value } from "./value.ts";

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

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

describe("update inner.key_value_pair.key", () => {
  bench("static assign", () => {
    const thing = new Outer();
    thing.inner.key_value_pair.key = "new";
  });

  bench("set by key", () => {
    const thing = new Outer();
    set(thing, "inner.key_value_pair.key", Value.string("new"));
  });

  bench("JSON round trip", () => {
    const thing = new Outer();
    const json: { inner: { key_value_pair: { key: string } } } = JSON.parse(
      JSON.stringify(thing, bigintReplacer),
    );
    json.inner.key_value_pair.key = "new";
    JSON.stringify(json);
  });
});
