import type {
  CurrentWeatherDocument,
  ForecastDocument,
  ForecastEntry,
  ForecastItemDocument,
  ForecastSeries,
  Logger,
  WeatherSnapshot,
  WeatherSource,
} from "./types.js";
import { msToKmh } from "./utils.js";

export const DEFAULT_WEATHER_BASE_URL = "https://api.openweathermap.org/data/2.5";
export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

export interface OpenWeatherClientOptions {
  apiKey: string | undefined;
  countryCode: string;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseCurrentWeather(doc: CurrentWeatherDocument): WeatherSnapshot {
  const condition = doc.weather?.[0];
  return {
    cityName: stringOrNull(doc.name),
    description: stringOrNull(condition?.description),
    condition: stringOrNull(condition?.main),
    temperatureC: numberOr(doc.main?.temp, 0),
    feelsLikeC: numberOr(doc.main?.feels_like, 0),
    humidityPct: numberOr(doc.main?.humidity, 0),
    windSpeedKmh: msToKmh(numberOr(doc.wind?.speed, 0)),
    windDeg: numberOr(doc.wind?.deg, 0),
    rain1hMm: numberOr(doc.rain?.["1h"], 0),
    observedAt: numberOr(doc.dt, Math.floor(Date.now() / 1000)),
    utcOffsetSeconds: numberOr(doc.timezone, 0),
    sunrise: typeof doc.sys?.sunrise === "number" ? doc.sys.sunrise : null,
    sunset: typeof doc.sys?.sunset === "number" ? doc.sys.sunset : null,
  };
}

function parseForecastItem(item: ForecastItemDocument | null): ForecastEntry | null {
  if (!isObject(item) || typeof item.dt !== "number") {
    return null;
  }
  const condition = item.weather?.[0];
  return {
    time: item.dt,
    description: stringOrNull(condition?.description),
    condition: stringOrNull(condition?.main),
    temperatureC: numberOr(item.main?.temp, 0),
    feelsLikeC: numberOr(item.main?.feels_like, 0),
    humidityPct: numberOr(item.main?.humidity, 0),
    windSpeedKmh: msToKmh(numberOr(item.wind?.speed, 0)),
    windDeg: numberOr(item.wind?.deg, 0),
    rain3hMm: numberOr(item.rain?.["3h"], 0),
    precipProbabilityPct: numberOr(item.pop, 0) * 100,
  };
}

export function parseForecast(doc: ForecastDocument): ForecastSeries | null {
  if (!Array.isArray(doc.list)) {
    return null;
  }
  const entries = doc.list
    .map(parseForecastItem)
    .filter((entry): entry is ForecastEntry => entry !== null)
    .sort((a, b) => a.time - b.time);
  return { entries, utcOffsetSeconds: numberOr(doc.city?.timezone, 0) };
}

/** OpenWeatherMap client. Failures are logged and reported as null; no retries. */
export class OpenWeatherClient implements WeatherSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: OpenWeatherClientOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_WEATHER_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  buildUrl(endpoint: "weather" | "forecast", city: string, apiKey: string): string {
    const params = new URLSearchParams({
      q: `${city},${this.options.countryCode}`,
      appid: apiKey,
      units: "metric",
    });
    return `${this.baseUrl}/${endpoint}?${params.toString()}`;
  }

  async fetchCurrent(city: string): Promise<WeatherSnapshot | null> {
    const data = await this.fetchDocument("weather", city);
    if (data === null) {
      return null;
    }
    if (!isObject(data)) {
      this.logger.error(`Unexpected current weather shape for ${city}: not an object`);
      return null;
    }
    this.logger.log(`Fetched current weather for ${city}`);
    return parseCurrentWeather(data as CurrentWeatherDocument);
  }

  async fetchForecast(city: string): Promise<ForecastSeries | null> {
    const data = await this.fetchDocument("forecast", city);
    if (data === null) {
      return null;
    }
    const series = isObject(data) ? parseForecast(data as ForecastDocument) : null;
    if (!series) {
      this.logger.error(`Unexpected forecast shape for ${city}: missing list`);
      return null;
    }
    this.logger.log(`Fetched ${series.entries.length} forecast entries for ${city}`);
    return series;
  }

  private async fetchDocument(
    endpoint: "weather" | "forecast",
    city: string
  ): Promise<unknown> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      this.logger.error(`WEATHER_API_KEY not set. Cannot fetch ${endpoint} for ${city}.`);
      return null;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(this.buildUrl(endpoint, city, apiKey), {
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`OpenWeatherMap ${endpoint} error ${response.status}`);
      }
      return await response.json();
    } catch (error) {
      this.logger.error(`Error fetching ${endpoint} data for ${city}`, error);
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
