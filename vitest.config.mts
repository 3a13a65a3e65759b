import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.mts"],
    // keep the package loggers quiet; logger tests write to their own streams
    env: { LOG_LEVEL: "silent" },
    restoreMocks: true,
    // leave setImmediate real so zero-delay dispatches do not advance the fake clock
    fakeTimers: {
      toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date"],
    },
  },
});
