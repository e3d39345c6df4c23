/**
 * Struct — optional base class giving aggregates method-style path access.
 *
 * Any class with @field members works with the free functions in
 * access.ts; extending Struct only adds the methods below.
 */

import * as access from "./access.ts";
import type { KeySequence } from "./path.ts";
import type { KeyOptions } from "./types.ts";
import type { Value } from "./value.ts";

export declare const structTag: unique symbol;

export abstract class Struct {
  declare readonly [structTag]: true;

  getValue(keys: KeySequence): Value {
    return access.getValue(this, keys);
  }

  setValue(keys: KeySequence, value: Value): void {
    access.setValue(this, keys, value);
  }

  /** `get("inner.y")` — splits on the delimiter, then `getValue`. */
  get(key: string, options?: KeyOptions): Value {
    return access.get(this, key, options);
  }

  set(key: string, value: Value, options?: KeyOptions): void {
    access.set(this, key, value, options);
  }

  typeName(): string {
    return access.typeName(this);
  }
}
