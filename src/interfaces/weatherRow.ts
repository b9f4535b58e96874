/**
 * One hourly sample with its day's aggregates and astronomy repeated onto it.
 */
export interface WeatherRow {
    dateTime: string;
    date: string;

    maxTempC: number;
    minTempC: number;
    totalSnowCm: number;
    sunHours: number;
    uvIndex: number;

    moonIllumination: number;
    moonrise: string;
    moonset: string;
    sunrise: string;
    sunset: string;

    dewPointC: number;
    feelsLikeC: number;
    heatIndexC: number;
    windChillC: number;
    windGustKmph: number;
    cloudCover: number;
    humidity: number;
    precipMm: number;
    pressureMb: number;
    tempC: number;
    visibilityKm: number;
    windDirDegree: number;
    windSpeedKmph: number;

    location: string;
}

export type WeatherColumn = keyof WeatherRow;

export interface WeatherTable {
    columns: readonly WeatherColumn[];
    rows: WeatherRow[];
}
