import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "faucet",
    environment: "node",
    // Engine logs are noise here; assertions go through return values and bodies.
    env: { LOG_LEVEL: "error" },
  },
});
