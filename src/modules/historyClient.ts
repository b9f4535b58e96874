import axios, { isAxiosError } from 'axios';
import https from 'https';
import { HistoryClient, HistoryQuery } from '../interfaces/historyClient';
import { ProviderError } from '../errors';
import { providerErrorMessage } from './parsePastWeather';

export const WWO_PAST_WEATHER_URL =
  'https://api.worldweatheronline.com/premium/v1/past-weather.ashx';

export interface WorldWeatherClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * HistoryClient backed by the WorldWeatherOnline past-weather endpoint.
 */
export function createWorldWeatherClient({
  baseUrl = WWO_PAST_WEATHER_URL,
  timeoutMs = 10_000,
}: WorldWeatherClientOptions = {}): HistoryClient {
  const axiosClient = axios.create({
    timeout: timeoutMs,
    httpsAgent: new https.Agent({ keepAlive: true, maxSockets: 1 }),
  });

  return {
    async getPastWeather({ location, startDate, endDate, frequency, apiKey }: HistoryQuery) {
      try {
        const response = await axiosClient.get<unknown>(baseUrl, {
          params: {
            key: apiKey,
            q: location,
            format: 'json',
            date: startDate,
            enddate: endDate,
            tp: frequency,
          },
        });

        return response.data;
      } catch (err) {
        // Transport failures (no response) go to the caller untouched
        if (!isAxiosError(err) || !err.response) throw err;

        const { status, data } = err.response;
        throw new ProviderError(
          providerErrorMessage(data) ?? `Weather provider answered HTTP ${status}`,
          status,
          { cause: err }
        );
      }
    },
  };
}
