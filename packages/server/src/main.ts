import { CsvToJson } from '@csvjson/core';
import { createApp } from './app.js';
import { loadServerConfig } from './config.js';
import type { ServerConfig } from './config.js';
import { attachLogger, createConsoleLogger } from './logging.js';

const logger = createConsoleLogger();

function readConfig(): ServerConfig {
  try {
    return loadServerConfig(process.argv.slice(2), process.env);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

const config = readConfig();

const converter = new CsvToJson();
attachLogger(converter, logger);

const server = createApp(converter).listen(config.port, config.host, () => {
  logger.log(`listening on http://${config.host}:${String(config.port)}`);
});

server.on('error', (error) => {
  logger.error(`server error: ${error.message}`);
  process.exitCode = 1;
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.log(`received ${signal}, shutting down`);
    server.close();
  });
}
