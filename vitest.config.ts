import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    testTimeout: 30_000,
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@agentport/shared": pkg("shared/src/index.ts"),
      "@agentport/deployer": pkg("deployer/src/index.ts"),
      "@agentport/cli": pkg("cli/src/program.ts"),
    },
  },
});
