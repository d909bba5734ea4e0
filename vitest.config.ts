import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const projectRootDir = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(projectRootDir, "."),
    },
  },
  test: {
    environment: "node",
    include: ["lib/**/__tests__/**/*.test.ts", "scripts/**/__tests__/**/*.test.ts"],
  },
});
