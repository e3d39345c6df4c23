/**
 * Path types and utilities.
 *
 * A path is a list of field names leading from a root aggregate down to a
 * leaf. Each aggregate level consumes exactly one segment; a leaf requires
 * none. An empty path denotes the value itself.
 */

export type Path = readonly string[];

export const DEFAULT_DELIMITER = ".";

/**
 * Any sequence of segments except a bare string, which is itself an
 * iterable of characters. Dotted keys go through `splitKey`.
 */
export type KeySequence = Iterable<string> & { readonly charAt?: never };

export function toPath(keys: KeySequence): Path {
  if (typeof keys === "string") {
    throw new TypeError(
      `Expected a sequence of keys, got the string ${JSON.stringify(keys)}; use get/set for dotted keys`,
    );
  }
  return Array.isArray(keys) ? keys : Array.from(keys);
}

/**
 * Split a dotted key into segments. `""` yields `[""]`, not `[]`.
 */
export function splitKey(key: string, delimiter = DEFAULT_DELIMITER): Path {
  if (delimiter === "") {
    throw new Error("Key delimiter must not be empty");
  }
  return key.split(delimiter);
}
