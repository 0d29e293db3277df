import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigError, loadConfig } from "../src/config";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "radnote-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses defaults when nothing is configured", () => {
    const config = loadConfig({ DATA_DIRECTORY: dir });

    expect(config).toEqual({
      port: 4000,
      dataDirectory: dir,
      snapshotFile: join(dir, "rad.json"),
      corsOrigin: "*",
      feedBaseUrl: "https://geofeeds.net/radnote",
      defaultQueryRadiusMeters: 10,
      alert: { alertLevelUsv: 1.0, alertRegionMeters: 1000, sampleMinutes: 15, syncMinutes: 60 },
    });
  });

  it("reads alert values from config.json in the data directory", async () => {
    await writeFile(
      join(dir, "config.json"),
      JSON.stringify({
        radnote_alert_at_usv: 0.5,
        radnote_alert_region_meters: 2500,
        radnote_alert_sample_minutes: 5,
        radnote_alert_sync_minutes: 30,
      })
    );

    const config = loadConfig({ DATA_DIRECTORY: dir });

    expect(config.alert).toEqual({ alertLevelUsv: 0.5, alertRegionMeters: 2500, sampleMinutes: 5, syncMinutes: 30 });
  });

  it("lets environment variables override config.json", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({ radnote_alert_at_usv: 0.5 }));

    const config = loadConfig({ DATA_DIRECTORY: dir, RADNOTE_ALERT_AT_USV: "2.5", API_PORT: "8080" });

    expect(config.alert.alertLevelUsv).toBe(2.5);
    expect(config.port).toBe(8080);
  });

  it("strips trailing slashes from the feed base url", () => {
    const config = loadConfig({ DATA_DIRECTORY: dir, FEED_BASE_URL: "https://feeds.example.org/rad/" });
    expect(config.feedBaseUrl).toBe("https://feeds.example.org/rad");
  });

  it("rejects an unparsable config.json", async () => {
    await writeFile(join(dir, "config.json"), "{radnote_alert_at_usv: 1");
    expect(() => loadConfig({ DATA_DIRECTORY: dir })).toThrow(ConfigError);
  });

  it("rejects mistyped values in config.json", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({ radnote_alert_region_meters: "far" }));
    expect(() => loadConfig({ DATA_DIRECTORY: dir })).toThrow(ConfigError);
  });

  it("rejects an invalid port", () => {
    expect(() => loadConfig({ DATA_DIRECTORY: dir, API_PORT: "not-a-port" })).toThrow(ConfigError);
  });
});
