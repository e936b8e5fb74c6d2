// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,          // describe/it/test/expect without imports
    environment: "node",
    include: ["src/**/*.test.ts"]
  }
});
