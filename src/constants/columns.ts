import { WeatherColumn } from '../interfaces/weatherRow';

// CSV column order
export const WEATHER_COLUMNS = [
  'dateTime',
  'date',
  'maxTempC',
  'minTempC',
  'totalSnowCm',
  'sunHours',
  'uvIndex',
  'moonIllumination',
  'moonrise',
  'moonset',
  'sunrise',
  'sunset',
  'dewPointC',
  'feelsLikeC',
  'heatIndexC',
  'windChillC',
  'windGustKmph',
  'cloudCover',
  'humidity',
  'precipMm',
  'pressureMb',
  'tempC',
  'visibilityKm',
  'windDirDegree',
  'windSpeedKmph',
  'location',
] as const satisfies readonly WeatherColumn[];
