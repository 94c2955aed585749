import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(process.cwd(), "shared"),
    },
  },
  test: {
    environment: "node",
    globals: true,
    include: [
      "server/**/*.test.ts"
    ],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
});
