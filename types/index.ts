// types/index.ts

// --- 1. Weather Payload (what the provider returns and the cache stores) ---
export interface IWeatherData {
  city: string;
  country?: string;
  temperature: number; // °C
  description: string;
  humidity?: number; // %
  pressure?: number; // hPa
  windSpeed?: number; // m/s
  provider: string;
  fetchedAt: string; // ISO timestamp of the upstream fetch
}

export interface IWeatherLookup {
  weather: IWeatherData;
  cached: boolean;
}

// --- 2. History ---
export interface INewWeatherQuery {
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

export interface IWeatherQueryRecord extends INewWeatherQuery {
  id: string;
}

export interface IPruneResult {
  deleted: number;
  cities: number;
  failedCities: string[];
}

export interface ICityCount {
  city: string;
  count: number;
}

export interface IHistoryStats {
  totalQueries: number;
  queriesSince: number;
  uniqueCities: number;
  uniqueClients: number;
  cacheHits: number;
  topCities: ICityCount[];
}

// --- 3. Key-Value Store (cache + rate windows) ---
export interface IWindowHit {
  count: number;
  allowed: boolean;
  resetInMs: number;
}

export interface IKeyValueStore {
  readonly kind: 'redis' | 'memory';
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<boolean>;
  /**
   * Fixed-window check-and-increment, atomic per key. A blocked hit leaves
   * the count untouched.
   */
  hitWindow(key: string, limit: number, windowSeconds: number): Promise<IWindowHit>;
  ping(): Promise<boolean>;
}

export type Clock = () => number;

export type HealthCheck = () => Promise<boolean>;
