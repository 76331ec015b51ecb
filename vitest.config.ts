import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["wheelctl/test/**/*.test.ts"],
    environment: "node",
  },
});
