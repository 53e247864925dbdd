// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    reporters: ["default"],
    include: ["backend/services/*/test/**/*.spec.ts"],
    env: {
      LOG_LEVEL: "silent",
      SERVICE_NAME: "render-with-test",
      WIDGET_PORT: "4101",
    },
  },
});
