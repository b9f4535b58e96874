import { z } from "zod";
import {
  AstronomySchema,
  DailySchema,
  HourlySchema,
  PastWeatherEnvelopeSchema,
} from "../schemas/pastWeather.schema";

export type PastWeatherEnvelope = z.infer<typeof PastWeatherEnvelopeSchema>;

export type DailyRecord = z.infer<typeof DailySchema>;
export type HourlyRecord = z.infer<typeof HourlySchema>;
export type Astronomy = z.infer<typeof AstronomySchema>;
