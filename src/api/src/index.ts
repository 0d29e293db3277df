import { config as loadEnv } from "dotenv";
import { resolve } from "path";
loadEnv({ path: resolve(__dirname, "../../../.env") });

import { createServer } from "http";
import { mkdir } from "fs/promises";
import logger from "./logger";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { DeviceEventStore } from "./services/device-store";

async function main() {
  const config = loadConfig();
  await mkdir(config.dataDirectory, { recursive: true });

  const store = new DeviceEventStore({ snapshotFile: config.snapshotFile, logger });
  await store.ensureLoaded();

  const app = createApp({ config, store, logger });
  const server = createServer(app);

  server.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        dataDirectory: config.dataDirectory,
        alertLevelUsv: config.alert.alertLevelUsv,
        alertRegionMeters: config.alert.alertRegionMeters,
      },
      "Radnote API server started"
    );
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down...");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  logger.fatal({ err }, "API failed to start");
  process.exit(1);
});
