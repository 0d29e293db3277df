import type { Response } from "express";
import type { SnapshotSource } from "../services/device-store";

export async function sendDeviceListing(
  store: SnapshotSource,
  res: Response,
  signal?: AbortSignal
): Promise<void> {
  const snapshot = await store.snapshot(signal);
  res.status(200).type("application/json").send(JSON.stringify(snapshot, null, 4));
}
