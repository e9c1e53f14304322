import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts", "packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    environment: "node",
  },
  resolve: {
    alias: {
      "@switchboard/types": source("types"),
      "@switchboard/core": source("core"),
      "@switchboard/tools": source("tools"),
      "@switchboard/runtime": source("runtime"),
      "@switchboard/persistence": source("persistence"),
    },
  },
});
