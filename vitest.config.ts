import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
      "@test": fileURLToPath(new URL("./test", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    hookTimeout: 30000,
    exclude: [
      "**/node_modules/**",
      "**/dist/**",
      "**/.{idea,git,cache,output,temp}/**",
      "**/{karma,rollup,webpack,vite,vitest,jest,ava,babel,nyc,cypress,tsup,build}.config.*"
    ],
    coverage: {
      include: ["src/**/*.ts"],
      exclude: [
        // Type definitions only
        "src/types/**",

        // Test files
        "**/*.test.ts",
        "**/test/**",

        // Config files
        "**/*.config.ts",

        // Build output
        "dist/**",
        "**/node_modules/**",
      ],
    },
  },
});
