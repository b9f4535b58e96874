import type { Logger } from 'pino';
import { HistoryClient } from './historyClient';

export const FREQUENCIES = [1, 3, 6, 12] as const;

/** Hours between samples. */
export type Frequency = (typeof FREQUENCIES)[number];

/** Inclusive `YYYY-MM-DD` span covered by one provider request. */
export interface DateWindow {
    readonly start: string;
    readonly end: string;
}

export interface WeatherFetcherOptions {
    location: string;
    startDate: string;
    endDate: string;
    frequency: number;
    apiKey: string;
    verbose?: boolean;
    outputDir?: string;

    client?: HistoryClient;
    maxWindowDays?: number;
    logger?: Logger;
}
