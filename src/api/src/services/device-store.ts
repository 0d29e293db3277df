import { readFile, rename, writeFile } from "fs/promises";
import type { Logger } from "pino";
import {
  RADIATION_NOTEFILE,
  deviceSnapshotSchema,
  parseRadiationReading,
  type DeviceRecord,
  type DeviceSnapshot,
  type TelemetryEnvelope,
} from "@radnote/shared";
import { Mutex } from "./mutex";

/** Read side of the store, as used by query evaluation. */
export interface SnapshotSource {
  snapshot(signal?: AbortSignal): Promise<DeviceSnapshot>;
}

export interface DeviceEventStoreOptions {
  /** Path of the JSON snapshot, rewritten after every accepted event. */
  snapshotFile: string;
  logger: Logger;
}

/**
 * Latest radiation reading per device. The mapping and its snapshot file are
 * only touched while holding the store's mutex: the lazy load, each
 * read-modify-write with its persist, and every copy handed to queries.
 */
export class DeviceEventStore implements SnapshotSource {
  private readonly mutex = new Mutex();
  private readonly snapshotFile: string;
  private readonly logger: Logger;
  private records: Map<string, DeviceRecord> | null = null;

  constructor(options: DeviceEventStoreOptions) {
    this.snapshotFile = options.snapshotFile;
    this.logger = options.logger.child({ component: "device-store" });
  }

  /**
   * Number of devices currently held, 0 until the first load completes.
   * Read without the lock, so it is approximate while ingestion is running.
   */
  get size(): number {
    return this.records?.size ?? 0;
  }

  async ensureLoaded(signal?: AbortSignal): Promise<void> {
    if (this.records) return;
    await this.mutex.runExclusive(() => this.loadLocked(), signal);
  }

  /**
   * Keep the envelope if it carries a radiation reading no older than the one
   * already held for the device. Returns whether the stored record changed.
   * A failed write is logged; the in-memory record stays authoritative.
   */
  async recordEvent(envelope: TelemetryEnvelope, signal?: AbortSignal): Promise<boolean> {
    if (envelope.notefileKind !== RADIATION_NOTEFILE) {
      return false;
    }

    return this.mutex.runExclusive(async () => {
      const records = await this.loadLocked();

      const current = records.get(envelope.deviceId);
      if (current && envelope.occurredAt < current.occurredAt) {
        this.logger.debug(
          { deviceId: envelope.deviceId, occurredAt: envelope.occurredAt, storedAt: current.occurredAt },
          "Ignoring stale reading"
        );
        return false;
      }

      const reading = parseRadiationReading(envelope.payload);
      records.set(envelope.deviceId, {
        deviceId: envelope.deviceId,
        occurredAt: envelope.occurredAt,
        bestLatitude: envelope.bestLatitude,
        bestLongitude: envelope.bestLongitude,
        usv: reading.usv ?? 0,
        reading,
      });

      await this.persistLocked(records);
      return true;
    }, signal);
  }

  /** Point-in-time copy of every record, safe to scan outside the lock. */
  async snapshot(signal?: AbortSignal): Promise<DeviceSnapshot> {
    return this.mutex.runExclusive(async () => {
      const records = await this.loadLocked();
      const copy: DeviceSnapshot = {};
      for (const [deviceId, record] of records) {
        copy[deviceId] = { ...record, reading: record.reading && { ...record.reading } };
      }
      return copy;
    }, signal);
  }

  // Published only once fully read, so the unlocked check in ensureLoaded
  // never sees a half-loaded mapping.
  private async loadLocked(): Promise<Map<string, DeviceRecord>> {
    if (this.records) return this.records;

    const records = await this.readSnapshot();
    this.records = records;
    return records;
  }

  private async readSnapshot(): Promise<Map<string, DeviceRecord>> {
    const records = new Map<string, DeviceRecord>();

    let contents: string;
    try {
      contents = await readFile(this.snapshotFile, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.debug({ file: this.snapshotFile }, "No snapshot yet, starting empty");
      } else {
        this.logger.warn({ err, file: this.snapshotFile }, "Can't read snapshot, starting empty");
      }
      return records;
    }

    let json: unknown;
    try {
      json = JSON.parse(contents);
    } catch (err) {
      this.logger.warn({ err, file: this.snapshotFile }, "Can't parse snapshot, starting empty");
      return records;
    }

    const parsed = deviceSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        { issues: parsed.error.issues.length, file: this.snapshotFile },
        "Snapshot does not match device record layout, starting empty"
      );
      return records;
    }

    for (const [deviceId, record] of Object.entries(parsed.data)) {
      records.set(deviceId, record);
    }
    this.logger.info({ devices: records.size, file: this.snapshotFile }, "Loaded device snapshot");
    return records;
  }

  // Written beside the target then renamed over it, so readers of the file
  // see either the previous snapshot or the new one.
  private async persistLocked(records: Map<string, DeviceRecord>): Promise<void> {
    const tempFile = `${this.snapshotFile}.tmp`;
    try {
      const contents = JSON.stringify(Object.fromEntries(records));
      await writeFile(tempFile, contents, { mode: 0o644 });
      await rename(tempFile, this.snapshotFile);
    } catch (err) {
      this.logger.error({ err, file: this.snapshotFile }, "Can't store snapshot");
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
