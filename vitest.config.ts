import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    include: ["{api,data,frontend,shared}/**/*.test.{ts,tsx}"],
  },
});
