import { Frequency } from './weatherHistory';

export interface HistoryQuery {
    location: string;
    startDate: string;
    endDate: string;
    frequency: Frequency;
    apiKey: string;
}

/**
 * Sends one past-weather request and resolves with the decoded JSON body.
 */
export interface HistoryClient {
    getPastWeather(query: HistoryQuery): Promise<unknown>;
}
