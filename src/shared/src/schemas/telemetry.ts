import { z } from "zod";

/**
 * An event as routed by Notehub. Only the fields read here are declared;
 * everything else the router attaches passes through.
 */
export const telemetryEventSchema = z
  .object({
    device: z.string().min(1),
    file: z.string(),
    when: z.number().finite().default(0),
    best_lat: z.number().finite().default(0),
    best_lon: z.number().finite().default(0),
    body: z.record(z.unknown()).optional(),
  })
  .passthrough();

// Each field falls back to undefined on a type mismatch so one bad field
// does not discard the dose rate. Numbers must be finite: JSON.parse reads
// 1e400 as Infinity, which would be written back to the snapshot as null.
export const radiationReadingSchema = z.object({
  cpm: z.number().finite().optional().catch(undefined),
  cpm_count: z.number().int().optional().catch(undefined),
  csecs: z.number().int().optional().catch(undefined),
  sensor: z.string().optional().catch(undefined),
  temperature: z.number().finite().optional().catch(undefined),
  voltage: z.number().finite().optional().catch(undefined),
  usv: z.number().finite().optional().catch(undefined),
});

export type TelemetryEventInput = z.input<typeof telemetryEventSchema>;
export type TelemetryEvent = z.infer<typeof telemetryEventSchema>;
export type RadiationReading = z.infer<typeof radiationReadingSchema>;

export interface TelemetryEnvelope {
  deviceId: string;
  occurredAt: number;
  notefileKind: string;
  bestLatitude: number;
  bestLongitude: number;
  payload: Record<string, unknown>;
}

export type DecodeResult =
  | { success: true; envelope: TelemetryEnvelope }
  | { success: false; error: z.ZodError };

export function decodeTelemetryEnvelope(input: unknown): DecodeResult {
  const parsed = telemetryEventSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }

  const event = parsed.data;
  return {
    success: true,
    envelope: {
      deviceId: event.device,
      occurredAt: event.when,
      notefileKind: event.file,
      bestLatitude: event.best_lat,
      bestLongitude: event.best_lon,
      payload: event.body ?? {},
    },
  };
}

export function parseRadiationReading(payload: Record<string, unknown>): RadiationReading {
  const parsed = radiationReadingSchema.safeParse(payload);
  return parsed.success ? parsed.data : {};
}
