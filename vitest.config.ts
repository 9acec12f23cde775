import { defineConfig } from "vitest/config";

// Messages render local time; pin the zone for every way the suite is started
process.env.TZ = "UTC";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: { TZ: "UTC" },
  },
});
