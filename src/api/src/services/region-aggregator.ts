import type { Logger } from "pino";
import { hasKnownLocation, metersApart, type DeviceRecord } from "@radnote/shared";
import type { SnapshotSource } from "./device-store";

export interface RegionQuery {
  latitude: number;
  longitude: number;
  radiusMeters?: number;
}

export interface RegionAggregate {
  latitude: number;
  longitude: number;
  radiusMeters: number;
  count: number;
  min: number;
  max: number;
  avg: number;
  /** Unix seconds at which the aggregate was computed. */
  modified: number;
}

export function aggregateRegion(
  records: Iterable<DeviceRecord>,
  query: RegionQuery,
  defaultRadiusMeters: number,
  now: Date = new Date()
): RegionAggregate {
  const radiusMeters = query.radiusMeters || defaultRadiusMeters;
  const center = { latitude: query.latitude, longitude: query.longitude };

  let count = 0;
  let min = 0;
  let max = 0;
  let sum = 0;

  for (const record of records) {
    const location = { latitude: record.bestLatitude, longitude: record.bestLongitude };
    if (!hasKnownLocation(location)) continue;
    if (metersApart(location, center) > radiusMeters) continue;

    if (count === 0) {
      min = record.usv;
      max = record.usv;
    } else {
      min = Math.min(min, record.usv);
      max = Math.max(max, record.usv);
    }
    sum += record.usv;
    count++;
  }

  return {
    latitude: query.latitude,
    longitude: query.longitude,
    radiusMeters,
    count,
    min,
    max,
    avg: count > 0 ? sum / count : 0,
    modified: Math.floor(now.getTime() / 1000),
  };
}

export async function summarizeRegion(
  store: SnapshotSource,
  query: RegionQuery,
  defaultRadiusMeters: number,
  logger: Logger,
  signal?: AbortSignal
): Promise<RegionAggregate> {
  const snapshot = await store.snapshot(signal);
  const aggregate = aggregateRegion(Object.values(snapshot), query, defaultRadiusMeters);

  if (aggregate.count === 0) {
    logger.debug(
      {
        lat: aggregate.latitude,
        lon: aggregate.longitude,
        radiusMeters: aggregate.radiusMeters,
        devices: Object.keys(snapshot).length,
      },
      "No devices in region"
    );
  }
  return aggregate;
}
