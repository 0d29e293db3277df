import { describe, it, expect } from "vitest";
import { JSON_FEED_VERSION, buildRegionFeed, buildWarningFeed } from "../src/services/json-feed";

const baseUrl = "https://geofeeds.example.net/radnote";
const now = new Date("2024-03-01T12:00:00.000Z");

describe("buildRegionFeed", () => {
  const aggregate = {
    latitude: 35.5,
    longitude: 139.25,
    radiusMeters: 10,
    count: 2,
    min: 0.1,
    max: 0.3,
    avg: 0.2,
    modified: 1709294400,
  };

  it("wraps the aggregate in a single-item feed", () => {
    const feed = buildRegionFeed(aggregate, baseUrl, now);

    expect(feed.version).toBe(JSON_FEED_VERSION);
    expect(feed.title).toBe("radnote geofeed for 35.500000,139.250000");
    expect(feed.feed_url).toBe(`${baseUrl}/?lat=35.500000&lon=139.250000`);
    expect(feed.items).toHaveLength(1);
    expect(feed.items[0].id).toBe("region");
    expect(feed.items[0].url).toBe(`${baseUrl}/region?lat=35.500000&lon=139.250000`);
    expect(feed.items[0].date_published).toBe("2024-03-01T12:00:00.000Z");
    expect(feed.items[0].date_modified).toBe("2024-03-01T12:00:00.000Z");
  });

  it("carries the statistics as the item text", () => {
    const feed = buildRegionFeed(aggregate, baseUrl, now);

    expect(JSON.parse(feed.items[0].content_text)).toEqual({
      lat: 35.5,
      lon: 139.25,
      radius_meters: 10,
      count: 2,
      usv_min: 0.1,
      usv_max: 0.3,
      usv_avg: 0.2,
      modified: 1709294400,
    });
  });

  it("formats negative coordinates", () => {
    const feed = buildRegionFeed({ ...aggregate, latitude: -33.865143, longitude: -70.5 }, baseUrl, now);
    expect(feed.feed_url).toBe(`${baseUrl}/?lat=-33.865143&lon=-70.500000`);
  });
});

describe("buildWarningFeed", () => {
  it("includes the sampling cadence when inside a warning region", () => {
    const feed = buildWarningFeed({ warning: true, sampleMinutes: 15, outboundMinutes: 60 }, 1.5, 2.5, baseUrl, now);

    expect(feed.items[0].id).toBe("1");
    expect(feed.items[0].url).toBe(`${baseUrl}/1?lat=1.500000&lon=2.500000`);
    expect(JSON.parse(feed.items[0].content_text)).toEqual({ warning: true, sample_mins: 15, outbound_mins: 60 });
  });

  it("reports only the flag outside a warning region", () => {
    const feed = buildWarningFeed({ warning: false }, 1.5, 2.5, baseUrl, now);
    expect(feed.items[0].content_text).toBe('{"warning":false}');
  });
});
