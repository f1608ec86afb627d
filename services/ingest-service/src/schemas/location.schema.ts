import { z } from 'zod';

export const LocationSourceSchema = z.object({
  name: z.string().min(1),
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  series_id: z.string().min(1),
  station_id: z.string().min(1),
  timezone: z.string().min(1),
});

export const LocationFileSchema = z.object({
  locations: z.array(LocationSourceSchema).min(1),
});

export type LocationSource = z.infer<typeof LocationSourceSchema>;
