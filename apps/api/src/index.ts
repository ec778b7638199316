import { ResultAsync } from 'neverthrow';

import { createAppContext } from './context.js';
import type { ApiServer } from './core/http.js';
import { loadConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';
import { updateExternalServiceHealth } from './lib/metrics.js';
import { errorMessage } from './lib/result.js';
import { createServer } from './server.js';
import { createStore } from './store/index.js';

let server: ApiServer | null = null;
let isShuttingDown = false;

const start = async (): Promise<void> => {
  const configResult = loadConfig();
  if (configResult.isErr()) {
    process.stderr.write(
      `Invalid configuration:\n${configResult.error.map((issue) => `  - ${issue}`).join('\n')}\n`
    );
    process.exit(1);
  }

  const config = configResult.value;
  const logger = createLogger(config);

  const startResult = await createStore(config)
    .mapErr((error) => `Failed to open ${config.storeBackend} store: ${error.message}`)
    .andThen((store) => createAppContext(config, logger, store))
    .andThen((ctx) =>
      ResultAsync.fromPromise(
        createServer(ctx),
        (error) => `Failed to create server: ${errorMessage(error)}`
      )
    )
    .andThen((createdServer) => {
      server = createdServer;
      return ResultAsync.fromPromise(
        createdServer.listen({ port: config.port, host: config.host }),
        (error) => `Failed to start server: ${errorMessage(error)}`
      );
    });

  startResult.match(
    () => {
      logger.info(
        { port: config.port, store: config.storeBackend },
        `bias-meter API listening on ${config.host}:${config.port}`
      );
      updateExternalServiceHealth('store', true);
    },
    (error) => {
      logger.fatal(error);
      process.stderr.write(`${error}\n`);
      process.exit(1);
    }
  );
};

const createShutdownHandler = (signal: string) => async () => {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (!server) {
    process.stderr.write('Server not initialized, exiting\n');
    process.exit(1);
  }

  const runningServer = server;
  runningServer.log.info(`${signal} received, shutting down gracefully`);

  // Closing the server also closes the store through its onClose hook
  await ResultAsync.fromPromise(
    runningServer.close(),
    (error) => `Failed to close server on ${signal}: ${errorMessage(error)}`
  ).match(
    () => {
      runningServer.log.info('Server closed successfully');
      process.exit(0);
    },
    (error) => {
      runningServer.log.error(error);
      process.exit(1);
    }
  );
};

process.once('SIGTERM', createShutdownHandler('SIGTERM'));
process.once('SIGINT', createShutdownHandler('SIGINT'));

start().catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exit(1);
});
