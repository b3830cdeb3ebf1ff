// models/weatherQueryModel.ts
import mongoose, { Schema, Document, Model, Types } from 'mongoose';

export interface IWeatherQuery extends Document<Types.ObjectId> {
  city: string; // Normalized display form ("São Paulo")
  clientIp: string;
  temperature: number;
  description: string;
  country?: string;
  humidity?: number;
  pressure?: number;
  windSpeed?: number;
  cached: boolean; // Served from cache
  createdAt: Date;
}

const weatherQuerySchema = new Schema<IWeatherQuery>({
  city: { type: String, required: true, maxlength: 100 },
  clientIp: { type: String, required: true },
  temperature: { type: Number, required: true },
  description: { type: String, required: true, maxlength: 200 },
  country: { type: String },
  humidity: { type: Number },
  pressure: { type: Number },
  windSpeed: { type: Number },
  cached: { type: Boolean, default: false },
  // Set by the service clock rather than schema timestamps
  createdAt: { type: Date, default: Date.now, immutable: true }
}, {
  versionKey: false
});

// Newest-first per city, _id breaks ties in insertion order
weatherQuerySchema.index({ city: 1, createdAt: -1, _id: -1 });
weatherQuerySchema.index({ createdAt: -1 });

const WeatherQuery: Model<IWeatherQuery> = mongoose.model<IWeatherQuery>('WeatherQuery', weatherQuerySchema);

export default WeatherQuery;
