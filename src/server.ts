import "dotenv/config";

import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { bootstrapState } from "./context";
import { createLogger, logger } from "./observability/logger";

async function main() {
  const env = loadEnv();
  const log = createLogger(env.LOG_LEVEL);

  const state = await bootstrapState({ env, logger: log });
  const app = createApp(state, { logger: log, apiPrefix: env.API_PREFIX, corsOrigins: env.CORS_ORIGINS });

  const server = app.listen(env.PORT, env.HOST, () => {
    log.info(
      {
        host: env.HOST,
        port: env.PORT,
        data_loaded: state.dataset.status === "ready",
        model_ready: state.model.isReady,
      },
      "server_listening",
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, "server_stopping");
    server.close((error) => {
      if (error) {
        log.error({ err: error }, "server_close_failed");
        process.exitCode = 1;
      }
    });
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "server_start_failed");
  process.exitCode = 1;
});
