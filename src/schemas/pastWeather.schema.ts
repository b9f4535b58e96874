import { z } from "zod";

// WorldWeatherOnline sends every number as a string ("12", "0.0")
const numeric = z.union([z.string().trim().min(1), z.number()]).pipe(z.coerce.number().finite());

/**
 * astronomy[] entry of a daily record
 */
export const AstronomySchema = z.object({
  sunrise: z.string(),
  sunset: z.string(),
  moonrise: z.string(),
  moonset: z.string(),
  moon_illumination: numeric,
});

/**
 * hourly[] entry of a daily record
 */
export const HourlySchema = z.object({
  time: z.union([z.string().regex(/^\d{1,4}$/), z.number().int().nonnegative()]).pipe(z.coerce.number()),

  tempC: numeric,
  FeelsLikeC: numeric,
  HeatIndexC: numeric,
  WindChillC: numeric,
  DewPointC: numeric,

  humidity: numeric,
  precipMM: numeric,
  pressure: numeric,
  visibility: numeric,
  cloudcover: numeric,

  windspeedKmph: numeric,
  winddirDegree: numeric,
  WindGustKmph: numeric,
});

export const DailySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD"),

  maxtempC: numeric,
  mintempC: numeric,
  totalSnow_cm: numeric,
  sunHour: numeric,
  uvIndex: numeric,

  astronomy: z.array(AstronomySchema).min(1),
  hourly: z.array(HourlySchema).min(1),
});

/**
 * Only the envelope is checked here; daily records are validated one at a
 * time so a bad day is reported against its own index.
 */
export const PastWeatherEnvelopeSchema = z.object({
  data: z.object({
    weather: z.array(z.unknown()),
  }),
});

export const ProviderErrorBodySchema = z.object({
  data: z.object({
    error: z.array(z.object({ msg: z.string() })).min(1),
  }),
});
