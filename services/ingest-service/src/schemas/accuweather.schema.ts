import { z } from 'zod';

export const GeopositionSchema = z.object({
  Key: z.string().min(1),
  LocalizedName: z.string().optional(),
});

const UnitValueSchema = z.object({
  Value: z.number().nullable(),
  Unit: z.string(),
  UnitType: z.number().optional(),
});

export const HourlyForecastSchema = z.object({
  DateTime: z.string().min(1),
  EpochDateTime: z.number().optional(),
  Temperature: UnitValueSchema,
  IconPhrase: z.string().optional(),
  PrecipitationProbability: z.number().optional(),
});

export const CurrentConditionsSchema = z.object({
  LocalObservationDateTime: z.string().min(1),
  EpochTime: z.number().optional(),
  WeatherText: z.string().optional(),
  Temperature: z.object({
    Metric: UnitValueSchema,
    Imperial: UnitValueSchema.optional(),
  }),
});

export type HourlyForecast = z.infer<typeof HourlyForecastSchema>;
export type CurrentConditions = z.infer<typeof CurrentConditionsSchema>;
