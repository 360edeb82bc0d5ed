import { vi } from "vitest";
import type { ForecastEntry, ForecastSeries, Logger, WeatherSnapshot } from "../src/types.js";

export const IST_OFFSET = 19800;

// Saturday 17 October 2026, 15:00 in Asia/Kolkata.
export const SATURDAY_AFTERNOON = new Date("2026-10-17T09:30:00Z");
export const SATURDAY_AFTERNOON_UNIX = 1792229400;

export function silentLogger(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeSnapshot(overrides: Partial<WeatherSnapshot> = {}): WeatherSnapshot {
  return {
    cityName: "Gachibowli",
    description: "clear sky",
    condition: "Clear",
    temperatureC: 28,
    feelsLikeC: 30,
    humidityPct: 55,
    windSpeedKmh: 10.8,
    windDeg: 90,
    rain1hMm: 0,
    observedAt: SATURDAY_AFTERNOON_UNIX,
    utcOffsetSeconds: IST_OFFSET,
    sunrise: 1792197900,
    sunset: null,
    ...overrides,
  };
}

export function makeEntry(time: number, overrides: Partial<ForecastEntry> = {}): ForecastEntry {
  return {
    time,
    description: "few clouds",
    condition: "Clouds",
    temperatureC: 27,
    feelsLikeC: 28,
    humidityPct: 60,
    windSpeedKmh: 12,
    windDeg: 180,
    rain3hMm: 0,
    precipProbabilityPct: 10,
    ...overrides,
  };
}

/** Two local days: three evening slots on Saturday, five on Sunday. */
export function makeForecast(): ForecastSeries {
  return {
    utcOffsetSeconds: IST_OFFSET,
    entries: [
      makeEntry(1792238400, { temperatureC: 31.4, condition: "Clear", precipProbabilityPct: 0 }),
      makeEntry(1792249200, { temperatureC: 27.6 }),
      makeEntry(1792260000, { temperatureC: 24.2 }),
      makeEntry(1792270800, { temperatureC: 22.5, precipProbabilityPct: 35 }),
      makeEntry(1792281600, { temperatureC: 21.6 }),
      makeEntry(1792292400, { temperatureC: 25.1 }),
      makeEntry(1792303200, { temperatureC: 29.8, condition: "Rain", precipProbabilityPct: 80 }),
      makeEntry(1792314000, { temperatureC: 30.3 }),
    ],
  };
}
