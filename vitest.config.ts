import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      JWT_SECRET: "test-secret",
      PAYMENT_AUTO_CAPTURE: "false",
      PAYMENT_GATEWAY_DEFAULT_MODE: "production",
    },
  },
});
