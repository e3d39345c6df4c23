import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // esbuild renames a class whose legacy decorators refer to the class
  // itself (`Chain` -> `_Chain`); SWC keeps the declared name.
  esbuild: false,
  plugins: [swc.vite()],
  test: {
    include: ["src/**/*.test.ts"],
    benchmark: {
      include: ["src/**/*.bench.ts"],
    },
  },
});
