export { WeatherFetcher, DEFAULT_MAX_WINDOW_DAYS } from './modules/weatherFetcher';
export { createWorldWeatherClient, WWO_PAST_WEATHER_URL } from './modules/historyClient';
export type { WorldWeatherClientOptions } from './modules/historyClient';
export { parsePastWeather } from './modules/parsePastWeather';
export { toCsv, writeCsv, csvPathFor } from './modules/csvWriter';
export { dailyRecordToRows, flattenWindow } from './mappers/dailyRecordToRows';
export { splitIntoWindows, countDays, listDates } from './utils/dates';
export { WEATHER_COLUMNS } from './constants/columns';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export * from './errors';

export type { HistoryClient, HistoryQuery } from './interfaces/historyClient';
export type { DateWindow, Frequency, WeatherFetcherOptions } from './interfaces/weatherHistory';
export { FREQUENCIES } from './interfaces/weatherHistory';
export type { WeatherRow, WeatherColumn, WeatherTable } from './interfaces/weatherRow';
export type { FetchResult, OutputStatus } from './interfaces/fetchResult';
export type { DailyRecord, HourlyRecord } from './interfaces/pastWeather';
