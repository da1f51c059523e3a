#!/usr/bin/env node
import type { Server } from "node:http";
import { loadConfig, resolveConfigPath } from "./config.js";
import { createApp } from "./express.js";
import { createLogger } from "./log.js";
import { loadAllImages } from "./scanner.js";
import { CurrentSelection } from "./state.js";
import { loadTemplate } from "./template.js";
import { Updater } from "./updater.js";

async function main() {
  const started = Date.now();
  const configPath = resolveConfigPath(process.argv.slice(2), process.env);
  const config = await loadConfig(configPath);
  const logger = await createLogger(config.logFile);
  const template = await loadTemplate(config.templatePath);

  const files = await loadAllImages(config.imageDirectory, config, logger);
  const state = new CurrentSelection();
  const updater = new Updater({
    files,
    state,
    displaySeconds: config.displaySeconds,
    logger,
  });
  updater.start();

  const app = createApp({ config, state, template, logger });
  const server: Server = app.listen(config.port, () => {
    logger.info(
      `Starting server on :${config.port} (startup took ${Date.now() - started}ms)`
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    updater.stop();
    server.close((err) => {
      if (err) logger.error("Error closing server", err);
      logger.close();
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
