import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core/**/*.spec.ts", "host/**/*.spec.ts", "test/**/*.spec.ts", "tools/**/*.spec.ts"],
  },
});
