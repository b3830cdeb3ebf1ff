import { IHistoryStats, INewWeatherQuery, IWeatherQueryRecord } from '../../types';

export interface IHistoryStore {
    insert(entry: INewWeatherQuery): Promise<IWeatherQueryRecord>;
    /** Newest first by createdAt, then by insertion order. */
    findRecent(city: string, limit: number): Promise<IWeatherQueryRecord[]>;
    distinctCities(): Promise<string[]>;
    /**
     * Deletes the rows of `city` beyond the newest `keep`, as seen by a single read.
     * Rows inserted after that read are never deleted. Returns rows actually removed.
     */
    pruneCity(city: string, keep: number): Promise<number>;
    deleteOlderThan(cutoff: Date): Promise<number>;
    summarize(since: Date, topN: number): Promise<IHistoryStats>;
}
