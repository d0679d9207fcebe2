import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packagePath = (path: string): string =>
  fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@antiphon/contracts": packagePath("contracts/index.ts"),
      "@antiphon/adapters": packagePath("adapters/src/index.ts"),
      "@antiphon/engine": packagePath("engine/src/index.ts"),
      "@antiphon/cli": packagePath("cli/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
  },
});
