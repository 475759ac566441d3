import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.spec.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      JWT_SECRET: "test-secret-for-specs",
      STRIPE_SECRET_KEY: "sk_test_placeholder",
      REDIS_NAMESPACE: "rw:test",
    },
  },
});
