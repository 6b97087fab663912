import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: [
        "src/services/taskBranchService.ts",
        "src/services/commitHookService.ts",
        "src/services/configResolver.ts",
        "src/adapters/taskAdapter.ts",
      ],
      reporter: ["text", "lcov"],
    },
  },
});
