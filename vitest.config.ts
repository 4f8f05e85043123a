import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["gateway/**/*.test.ts"],
    restoreMocks: true,
  },
});
