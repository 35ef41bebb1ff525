import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.mts"],
    // auto-restore vi.spyOn after each test
    restoreMocks: true,
  },
});
