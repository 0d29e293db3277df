import { regionQuerySchema } from "@radnote/shared";
import type { z } from "zod";

export type LocationQuery =
  | { kind: "invalid"; error: z.ZodError }
  | { kind: "listing" }
  | { kind: "point"; latitude: number; longitude: number; radiusMeters?: number };

/**
 * Interpret lat/lon/radius_meters. Without coordinates, or at the (0,0)
 * "no location" sentinel, the caller gets the device listing instead.
 */
export function parseLocationQuery(query: unknown): LocationQuery {
  const parsed = regionQuerySchema.safeParse(query);
  if (!parsed.success) {
    return { kind: "invalid", error: parsed.error };
  }

  const { lat, lon, radius_meters } = parsed.data;
  if (lat === undefined || lon === undefined || (lat === 0 && lon === 0)) {
    return { kind: "listing" };
  }
  return { kind: "point", latitude: lat, longitude: lon, radiusMeters: radius_meters };
}
