import type { WarningRegionResult } from "./geofence";
import type { RegionAggregate } from "./region-aggregator";

export const JSON_FEED_VERSION = "https://jsonfeed.org/version/1";

export interface JsonFeedItem {
  id: string;
  url: string;
  content_text: string;
  date_published: string;
  date_modified?: string;
}

export interface JsonFeed {
  version: string;
  title: string;
  feed_url: string;
  items: JsonFeedItem[];
}

const formatCoordinate = (value: number): string => value.toFixed(6);

function locationQuery(latitude: number, longitude: number): string {
  return `lat=${formatCoordinate(latitude)}&lon=${formatCoordinate(longitude)}`;
}

/** Region statistics as a single-item feed; the item text is the stats JSON. */
export function buildRegionFeed(aggregate: RegionAggregate, baseUrl: string, now: Date = new Date()): JsonFeed {
  const query = locationQuery(aggregate.latitude, aggregate.longitude);
  const published = now.toISOString();

  const content = {
    lat: aggregate.latitude,
    lon: aggregate.longitude,
    radius_meters: aggregate.radiusMeters,
    count: aggregate.count,
    usv_min: aggregate.min,
    usv_max: aggregate.max,
    usv_avg: aggregate.avg,
    modified: aggregate.modified,
  };

  return {
    version: JSON_FEED_VERSION,
    title: `radnote geofeed for ${formatCoordinate(aggregate.latitude)},${formatCoordinate(aggregate.longitude)}`,
    feed_url: `${baseUrl}/?${query}`,
    items: [
      {
        id: "region",
        url: `${baseUrl}/region?${query}`,
        content_text: JSON.stringify(content),
        date_published: published,
        date_modified: published,
      },
    ],
  };
}

export function buildWarningFeed(
  result: WarningRegionResult,
  latitude: number,
  longitude: number,
  baseUrl: string,
  now: Date = new Date()
): JsonFeed {
  const query = locationQuery(latitude, longitude);
  const content = result.warning
    ? { warning: true, sample_mins: result.sampleMinutes, outbound_mins: result.outboundMinutes }
    : { warning: false };

  return {
    version: JSON_FEED_VERSION,
    title: `radnote warning feed for ${formatCoordinate(latitude)},${formatCoordinate(longitude)}`,
    feed_url: `${baseUrl}/?${query}`,
    items: [
      {
        id: "1",
        url: `${baseUrl}/1?${query}`,
        content_text: JSON.stringify(content),
        date_published: now.toISOString(),
      },
    ],
  };
}
