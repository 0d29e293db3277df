import { z } from "zod";

// Query strings arrive as text; an empty value counts as absent.
const numericParam = (schema: z.ZodNumber) =>
  z
    .string()
    .trim()
    .transform((value) => (value === "" ? undefined : value))
    .pipe(z.coerce.number().pipe(schema).optional())
    .optional();

export const regionQuerySchema = z
  .object({
    lat: numericParam(z.number().finite().min(-90).max(90)),
    lon: numericParam(z.number().finite().min(-180).max(180)),
    radius_meters: numericParam(z.number().finite().min(0)),
  })
  .refine((query) => (query.lat === undefined) === (query.lon === undefined), {
    message: "lat and lon must be supplied together",
    path: ["lat"],
  });

export type RegionQueryParams = z.infer<typeof regionQuerySchema>;
