import { Pool } from "pg";
import { createApp } from "./api.js";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { ControlService } from "./controlService.js";
import { createLogger } from "./logger.js";
import { runMigrations } from "./migrations.js";
import { ReadingCache } from "./readingCache.js";
import type { StoredReading } from "./readings.js";
import { PgReadingStore } from "./readingStore.js";
import { FileResponseArchive } from "./responseArchive.js";
import { SensorService } from "./sensorService.js";
import { TuyaApiClient } from "./tuyaApi.js";

const readConfig = (): AppConfig => {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      // eslint-disable-next-line no-console
      console.error(`${err.message}:`, err.fieldErrors);
    } else {
      // eslint-disable-next-line no-console
      console.error("Invalid configuration:", err);
    }
    process.exit(1);
  }
};

const main = async () => {
  const config = readConfig();
  const logger = createLogger({ level: config.logLevel, file: config.logFile });

  const pool = new Pool({ connectionString: config.databaseUrl, max: 10 });
  await runMigrations(pool, logger);
  logger.info("Database ready");

  const cache = new ReadingCache<StoredReading>();
  const store = new PgReadingStore(pool);

  const tuya = new TuyaApiClient({
    baseUrl: config.tuyaBaseUrl,
    credentials: { clientId: config.tuyaClientId, clientSecret: config.tuyaClientSecret },
    requestTimeoutMs: config.requestTimeoutMs,
    archive: config.responseArchiveDir ? new FileResponseArchive(config.responseArchiveDir, { logger }) : undefined,
    logger
  });

  const sensors = new SensorService(tuya, store, cache, { logger });
  const polling = sensors.startPolling(config.devices, config.pollIntervalMs);

  const control = new ControlService(tuya, cache, { logger });
  const controlLoop = control.start(config.controlIntervalMs);

  const app = createApp({ store, cache, tokenStatus: () => tuya.getTokenStatus(), logger });
  const server = app.listen(config.serverPort, config.serverHost, () => {
    logger.info(
      {
        host: config.serverHost,
        port: config.serverPort,
        devices: config.devices.length,
        pollIntervalMs: config.pollIntervalMs
      },
      "HTTP server listening"
    );
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received");

    polling.stop();
    controlLoop.stop();
    server.close((err) => {
      if (err) {
        logger.error({ err }, "HTTP server close failed");
      }
      pool
        .end()
        .catch((poolErr) => logger.error({ err: poolErr }, "Database pool close failed"))
        .finally(() => process.exit(err ? 1 : 0));
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
};

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
