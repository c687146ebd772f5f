import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      ENABLE_METRICS: "true",
      CAPCORN_BASE_URL: "http://capcorn.test/RestService",
      CAPCORN_SYSTEM: "test-system",
      CAPCORN_USER: "test-user",
      CAPCORN_PASSWORD: "test-secret",
      CAPCORN_HOTEL_ID: "9100",
      CAPCORN_PIN: "test-pin",
    },
  },
});
