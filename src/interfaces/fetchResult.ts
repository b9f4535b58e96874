import { IOFailureError } from '../errors';
import { WeatherTable } from './weatherRow';

export type OutputStatus =
    | { status: 'skipped' }
    | { status: 'written'; path: string }
    | { status: 'failed'; path: string; error: IOFailureError };

export interface FetchResult {
    table: WeatherTable;
    output: OutputStatus;
}
