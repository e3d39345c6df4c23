/**
 * fieldpath ESLint plugin.
 *
 * Catches Struct subclasses that path access cannot reach at build time.
 * Install @typescript-eslint/utils as a peer dependency to use this plugin.
 *
 * Usage (flat config):
 *
 *   import fieldpath from "fieldpath/eslint";
 *   export default [fieldpath.configs.recommended];
 */

import { requireField } from "./require-field.ts";

const configs: Record<string, unknown> = {};

const plugin = {
  meta: {
    name: "fieldpath",
    version: "0.1.0",
  },
  rules: {
    "require-field": requireField,
  },
  configs,
};

plugin.configs.recommended = {
  plugins: { fieldpath: plugin },
  rules: {
    "fieldpath/require-field": "error",
  },
};

export default plugin;
