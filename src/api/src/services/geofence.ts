import { hasKnownLocation, metersApart, type DeviceRecord, type GeoPoint } from "@radnote/shared";
import type { AlertConfig } from "../config";
import type { SnapshotSource } from "./device-store";

export type WarningThresholds = Pick<AlertConfig, "alertLevelUsv" | "alertRegionMeters">;

export type WarningRegionResult =
  | { warning: true; sampleMinutes: number; outboundMinutes: number }
  | { warning: false };

/**
 * True when any located device at or above the alert level lies within the
 * alert radius of the point. Stops at the first match.
 */
export function isLocationInWarningRegion(
  records: Iterable<DeviceRecord>,
  point: GeoPoint,
  thresholds: WarningThresholds
): boolean {
  for (const record of records) {
    if (record.usv < thresholds.alertLevelUsv) continue;

    const location = { latitude: record.bestLatitude, longitude: record.bestLongitude };
    if (!hasKnownLocation(location)) continue;

    if (metersApart(location, point) <= thresholds.alertRegionMeters) {
      return true;
    }
  }
  return false;
}

/**
 * Geofence check against the store, with the sampling cadence a device inside
 * the region should switch to.
 */
export async function evaluateWarningRegion(
  store: SnapshotSource,
  alert: AlertConfig,
  point: GeoPoint,
  signal?: AbortSignal
): Promise<WarningRegionResult> {
  const snapshot = await store.snapshot(signal);

  if (!isLocationInWarningRegion(Object.values(snapshot), point, alert)) {
    return { warning: false };
  }
  return {
    warning: true,
    sampleMinutes: alert.sampleMinutes,
    outboundMinutes: alert.syncMinutes,
  };
}
