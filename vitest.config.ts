import { defineConfig } from "vitest/config";

export default defineConfig({

  test: {

    environment: "node",
    exclude: [ "node_modules", "dist" ],
    include: [ "src/**/*.test.ts" ],
    name: "stationbase",
    pool: "forks",
    testTimeout: 30000
  }
});
