#!/usr/bin/env node
import { CommanderError } from "commander";
import { logger, setLogLevel } from "./logger";
import { buildGatewayConfig } from "./config";
import { parseArgs } from "./cli/args";
import { startGateway, watchRunningConfig } from "./app";

async function main(): Promise<void> {
  const overrides = parseArgs(process.argv.slice(2));
  const config = await buildGatewayConfig(overrides);
  setLogLevel(config.logLevel);

  logger.info("Démarrage midipump…");
  if (config.configPath) logger.info(`Configuration: ${config.configPath}`);

  const gateway = await startGateway(config);
  const stopWatch = watchRunningConfig(config, overrides);

  // Arrêt sans drain des dispatchs en cours
  const shutdown = (signal: string) => {
    logger.info(`Arrêt midipump (${signal})`);
    stopWatch();
    gateway.stop().then(
      () => process.exit(0),
      (err) => {
        logger.error("Erreur à l'arrêt:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  // MIDI IN illisible → fatal
  await gateway.fatal;
}

main().catch((err) => {
  if (err instanceof CommanderError) process.exit(err.exitCode);
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
