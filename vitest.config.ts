import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["app/api/src/**/*.test.ts"],
    environment: "node",
  },
});
