/**
 * Type-level tests for the value model and accessors.
 *
 * This file is NOT executed at runtime. It is checked by `npm run typecheck`
 * (tsc --noEmit). Every @ts-expect-error must suppress a real error — tsc
 * reports unused @ts-expect-error directives as errors, so each one doubles
 * as a negative assertion.
 */

import type { Accessor } from "./types.ts";
import type { NativeOf, Value } from "./value.ts";
import { Value as V, valueFrom } from "./value.ts";
import { primitives } from "./primitives.ts";
import { field } from "./decorators.ts";

type Equals<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2
    ? true
    : false;

function assertType<T extends true>(_: T) {}

// NativeOf maps each tag to its payload
assertType<Equals<NativeOf<"integer">, bigint>>(true);
assertType<Equals<NativeOf<"double">, number>>(true);
assertType<Equals<NativeOf<"string">, string>>(true);

// valueFrom narrows to the matching variant
const fromBigint = valueFrom(1n);
assertType<Equals<typeof fromBigint.type, "integer">>(true);
const fromNumber = valueFrom(1.5);
assertType<Equals<typeof fromNumber.type, "double">>(true);

// Primitive accessors are typed by their native
const intAccessor: Accessor<bigint> = primitives.integer;
const nextInt: bigint = primitives.integer.setValue(1n, [], V.integer(2n));
// @ts-expect-error — an integer accessor does not hold numbers
const wrongNative: Accessor<number> = primitives.integer;

// Narrowing on the tag gives the payload type
function payload(value: Value): string {
  switch (value.type) {
    case "integer":
      return value.value.toString(16);
    case "double":
      return value.value.toFixed(2);
    case "string":
      return value.value.toUpperCase();
  }
}

// @ts-expect-error — "boolean" is not a field type
field("boolean");

// @ts-expect-error — Value is closed
const bogus: Value = { type: "boolean", value: true };

void intAccessor;
void nextInt;
void wrongNative;
void payload;
void bogus;
