import { Model, Types } from 'mongoose';
import { IHistoryStore } from './IHistoryStore';
import WeatherQuery, { IWeatherQuery } from '../../models/weatherQueryModel';
import { IHistoryStats, INewWeatherQuery, IWeatherQueryRecord } from '../../types';

interface WeatherQueryLean {
    _id: Types.ObjectId;
    city: string;
    clientIp: string;
    temperature: number;
    description: string;
    country?: string;
    humidity?: number;
    pressure?: number;
    windSpeed?: number;
    cached: boolean;
    createdAt: Date;
}

interface SummaryFacets {
    total: { n: number }[];
    recent: { n: number; cities: number; clients: number; hits: number }[];
    top: { _id: string; count: number }[];
}

const NEWEST_FIRST = { createdAt: -1, _id: -1 } as const;

const toRecord = (doc: WeatherQueryLean): IWeatherQueryRecord => ({
    id: String(doc._id),
    city: doc.city,
    clientIp: doc.clientIp,
    temperature: doc.temperature,
    description: doc.description,
    country: doc.country,
    humidity: doc.humidity,
    pressure: doc.pressure,
    windSpeed: doc.windSpeed,
    cached: doc.cached,
    createdAt: doc.createdAt,
});

export class MongoHistoryStore implements IHistoryStore {
    constructor(private readonly model: Model<IWeatherQuery> = WeatherQuery) {}

    async insert(entry: INewWeatherQuery): Promise<IWeatherQueryRecord> {
        const doc = await this.model.create(entry);
        return { ...entry, id: String(doc._id) };
    }

    async findRecent(city: string, limit: number): Promise<IWeatherQueryRecord[]> {
        const docs = await this.model
            .find({ city })
            .sort(NEWEST_FIRST)
            .limit(limit)
            .lean<WeatherQueryLean[]>();
        return docs.map(toRecord);
    }

    async distinctCities(): Promise<string[]> {
        const cities: unknown[] = await this.model.distinct('city');
        return cities.filter((city): city is string => typeof city === 'string');
    }

    async pruneCity(city: string, keep: number): Promise<number> {
        // 1. Snapshot: ids beyond the newest `keep`
        const stale = await this.model
            .find({ city })
            .sort(NEWEST_FIRST)
            .skip(keep)
            .select({ _id: 1 })
            .lean<{ _id: Types.ObjectId }[]>();

        if (stale.length === 0) return 0;

        // 2. Delete exactly those ids; concurrent inserts are not in the list
        const result = await this.model.deleteMany({ _id: { $in: stale.map((doc) => doc._id) } });
        return result.deletedCount;
    }

    async deleteOlderThan(cutoff: Date): Promise<number> {
        const result = await this.model.deleteMany({ createdAt: { $lt: cutoff } });
        return result.deletedCount;
    }

    async summarize(since: Date, topN: number): Promise<IHistoryStats> {
        const [facets] = await this.model.aggregate<SummaryFacets>([
            {
                $facet: {
                    total: [{ $count: 'n' }],
                    recent: [
                        { $match: { createdAt: { $gte: since } } },
                        {
                            $group: {
                                _id: null,
                                n: { $sum: 1 },
                                cities: { $addToSet: '$city' },
                                clients: { $addToSet: '$clientIp' },
                                hits: { $sum: { $cond: ['$cached', 1, 0] } },
                            },
                        },
                        { $project: { _id: 0, n: 1, hits: 1, cities: { $size: '$cities' }, clients: { $size: '$clients' } } },
                    ],
                    top: [
                        { $match: { createdAt: { $gte: since } } },
                        { $group: { _id: '$city', count: { $sum: 1 } } },
                        { $sort: { count: -1, _id: 1 } },
                        { $limit: topN },
                    ],
                },
            },
        ]);

        const recent = facets?.recent[0];
        return {
            totalQueries: facets?.total[0]?.n ?? 0,
            queriesSince: recent?.n ?? 0,
            uniqueCities: recent?.cities ?? 0,
            uniqueClients: recent?.clients ?? 0,
            cacheHits: recent?.hits ?? 0,
            topCities: (facets?.top ?? []).map((row) => ({ city: row._id, count: row.count })),
        };
    }
}

export default MongoHistoryStore;
