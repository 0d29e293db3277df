import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { DeviceEventStore } from "./services/device-store";

export interface AppContext {
  config: AppConfig;
  store: DeviceEventStore;
  logger: Logger;
}
