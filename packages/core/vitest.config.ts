import { defineConfig } from "vitest/config";
import { sharedConfig } from "@dubline/vitest-config";

export default defineConfig({
  ...sharedConfig,
  test: {
    ...sharedConfig.test,
  },
});
