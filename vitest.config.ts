import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["genesisctl/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
  },
});
