import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    alias: {
      "@plasticscm-setup/logger": `${root}packages/logger/src/index.ts`,
      "@plasticscm-setup/installer": `${root}packages/installer/src/index.ts`,
    },
  },
});
