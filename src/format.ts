/**
 * Human-readable formatting for paths and values.
 *
 * Produces unambiguous strings like `root.inner.y` for paths and
 * `integer(-7)` for values. Useful for error messages and debugging.
 */

import type { Path } from "./path.ts";
import type { Value } from "./value.ts";

const IS_IDENT = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function formatPath(path: Path): string {
  let out = "root";
  for (const seg of path) {
    out += formatSegment(seg);
  }
  return out;
}

export function formatSegment(seg: string): string {
  return IS_IDENT.test(seg) ? "." + seg : "[" + JSON.stringify(seg) + "]";
}

export function formatValue(value: Value): string {
  switch (value.type) {
    case "integer":
      return "integer(" + value.value + ")";
    case "double":
      return "double(" + formatDouble(value.value) + ")";
    case "string":
      return "string(" + JSON.stringify(value.value) + ")";
  }
}

function formatDouble(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "Infinity";
  if (n === -Infinity) return "-Infinity";
  if (Object.is(n, -0)) return "-0";
  return String(n);
}
