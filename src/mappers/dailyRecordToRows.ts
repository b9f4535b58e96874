import { DailyRecord, HourlyRecord } from "../interfaces/pastWeather";
import { WeatherRow } from "../interfaces/weatherRow";
import { DateWindow, Frequency } from "../interfaces/weatherHistory";
import { SchemaMismatchError } from "../errors";
import { listDates } from "../utils/dates";

const pad2 = (n: number) => String(n).padStart(2, "0");

/**
 * Provider offsets are HHMM integers: 0, 300, 1200, 2100...
 */
export function offsetToClock(offset: number): string | null {
  const hours = Math.floor(offset / 100);
  const minutes = offset % 100;
  if (hours > 23 || minutes > 59) return null;
  return `${pad2(hours)}:${pad2(minutes)}:00`;
}

function hourToRow(
  day: DailyRecord,
  hour: HourlyRecord,
  clock: string,
  location: string
): WeatherRow {
  const astronomy = day.astronomy[0];

  return {
    dateTime: `${day.date} ${clock}`,
    date: day.date,

    maxTempC: day.maxtempC,
    minTempC: day.mintempC,
    totalSnowCm: day.totalSnow_cm,
    sunHours: day.sunHour,
    uvIndex: day.uvIndex,

    moonIllumination: astronomy.moon_illumination,
    moonrise: astronomy.moonrise,
    moonset: astronomy.moonset,
    sunrise: astronomy.sunrise,
    sunset: astronomy.sunset,

    dewPointC: hour.DewPointC,
    feelsLikeC: hour.FeelsLikeC,
    heatIndexC: hour.HeatIndexC,
    windChillC: hour.WindChillC,
    windGustKmph: hour.WindGustKmph,
    cloudCover: hour.cloudcover,
    humidity: hour.humidity,
    precipMm: hour.precipMM,
    pressureMb: hour.pressure,
    tempC: hour.tempC,
    visibilityKm: hour.visibility,
    windDirDegree: hour.winddirDegree,
    windSpeedKmph: hour.windspeedKmph,

    location,
  };
}

/**
 * Flattens one day into 24 / frequency rows, copying the day's date,
 * aggregates and astronomy onto each hourly sample.
 */
export function dailyRecordToRows(
  day: DailyRecord,
  location: string,
  frequency: Frequency
): WeatherRow[] {
  const expected = 24 / frequency;

  if (day.hourly.length !== expected) {
    throw new SchemaMismatchError(
      `${day.date}: expected ${expected} hourly records at ${frequency}h frequency, got ${day.hourly.length}`
    );
  }

  let previous = -1;

  return day.hourly.map((hour) => {
    const clock = offsetToClock(hour.time);
    if (clock === null) {
      throw new SchemaMismatchError(`${day.date}: time offset ${hour.time} is outside the day`);
    }
    if (hour.time <= previous) {
      throw new SchemaMismatchError(
        `${day.date}: time offset ${hour.time} does not follow ${previous}`
      );
    }
    previous = hour.time;

    return hourToRow(day, hour, clock, location);
  });
}

/**
 * Rows for one sub-window. The provider must return exactly the window's
 * days, in order, so windows concatenate without gaps or duplicates.
 */
export function flattenWindow(
  days: DailyRecord[],
  window: DateWindow,
  location: string,
  frequency: Frequency
): WeatherRow[] {
  const expectedDates = listDates(window.start, window.end);
  const actualDates = days.map((day) => day.date);

  if (
    actualDates.length !== expectedDates.length ||
    actualDates.some((date, i) => date !== expectedDates[i])
  ) {
    throw new SchemaMismatchError(
      `Window ${window.start}..${window.end}: expected days [${expectedDates.join(", ")}], got [${actualDates.join(", ")}]`
    );
  }

  return days.flatMap((day) => dailyRecordToRows(day, location, frequency));
}
