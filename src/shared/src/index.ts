export * from "./schemas/telemetry";
export * from "./schemas/device-record";
export * from "./schemas/region-query";
export * from "./utils/distance";
export * from "./utils/constants";
