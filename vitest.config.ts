import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["message-relay/src/**/*.test.ts"],
    environment: "node",
  },
});
