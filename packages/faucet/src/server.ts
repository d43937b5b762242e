// SPDX-License-Identifier: Apache-2.0
import "dotenv/config";
import { createLogger, errorFields } from "@spigot/service-kit";
import { loadConfig } from "./config.ts";
import { initializeFaucet } from "./init.ts";
import { listen } from "./listen.ts";

const log = createLogger("faucet", { module: "server" });

async function main(): Promise<void> {
  const config = loadConfig();
  const { app } = await initializeFaucet(config);

  const server = await listen(app, config.port);
  log.info("Starting faucet server", { port: config.port });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info("Shutting down", { signal });
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  log.error("Failed to start faucet", errorFields(err));
  process.exitCode = 1;
});
