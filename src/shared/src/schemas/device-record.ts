import { z } from "zod";
import { radiationReadingSchema } from "./telemetry";

export const deviceRecordSchema = z.object({
  deviceId: z.string().min(1),
  occurredAt: z.number().finite(),
  bestLatitude: z.number().finite(),
  bestLongitude: z.number().finite(),
  usv: z.number().finite(),
  reading: radiationReadingSchema.optional(),
});

export const deviceSnapshotSchema = z.record(deviceRecordSchema);

export type DeviceRecord = z.infer<typeof deviceRecordSchema>;
export type DeviceSnapshot = z.infer<typeof deviceSnapshotSchema>;
