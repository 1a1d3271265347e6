import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["hf2-cli/**/*.test.ts"],
    environment: "node",
  },
});
