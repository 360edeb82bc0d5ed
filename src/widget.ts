import type {
  DailySummaryBinding,
  ForecastEntry,
  ForecastSeries,
  ForecastSlotBinding,
  WeatherSnapshot,
  WidgetBindings,
} from "./types.js";
import {
  formatFixed,
  formatUnixTime,
  formatUnixTimestamp,
  localDateKey,
  localWeekdayShort,
  roundWhole,
  titleCase,
  weatherIcon,
} from "./utils.js";

export const FORECAST_SLOTS = 5;
export const FORECAST_DAYS = 5;

export type CardinalResolver = (degrees: number) => string;

function buildSlots(series: ForecastSeries): ForecastSlotBinding[] {
  return series.entries.slice(0, FORECAST_SLOTS).map((entry) => ({
    timeLabel: formatUnixTime(entry.time, series.utcOffsetSeconds),
    icon: weatherIcon(entry.condition),
    temperature: roundWhole(entry.temperatureC),
    precipProbabilityPct: roundWhole(entry.precipProbabilityPct),
  }));
}

function middayEntry(entries: ForecastEntry[], offsetSeconds: number): ForecastEntry {
  const distanceFromNoon = (entry: ForecastEntry): number => {
    const secondsIntoDay = (((entry.time + offsetSeconds) % 86400) + 86400) % 86400;
    return Math.abs(secondsIntoDay - 12 * 3600);
  };
  return entries.reduce((best, entry) =>
    distanceFromNoon(entry) < distanceFromNoon(best) ? entry : best
  );
}

function buildDays(series: ForecastSeries): DailySummaryBinding[] {
  const byDate = new Map<string, ForecastEntry[]>();
  for (const entry of series.entries) {
    const key = localDateKey(entry.time, series.utcOffsetSeconds);
    const bucket = byDate.get(key);
    if (bucket) {
      bucket.push(entry);
    } else {
      byDate.set(key, [entry]);
    }
  }

  const days: DailySummaryBinding[] = [];
  for (const entries of byDate.values()) {
    if (days.length >= FORECAST_DAYS) {
      break;
    }
    const temperatures = entries.map((entry) => entry.temperatureC);
    const representative = middayEntry(entries, series.utcOffsetSeconds);
    days.push({
      dayLabel: localWeekdayShort(entries[0].time, series.utcOffsetSeconds),
      high: roundWhole(Math.max(...temperatures)),
      low: roundWhole(Math.min(...temperatures)),
      icon: weatherIcon(representative.condition),
    });
  }
  return days;
}

/**
 * Collects everything the widget template needs. Both the current snapshot
 * and the forecast are required; without either there is no image.
 */
export function buildWidgetBindings(
  snapshot: WeatherSnapshot | null,
  forecast: ForecastSeries | null,
  resolveCardinal: CardinalResolver,
  fallbackCity: string
): WidgetBindings | null {
  if (!snapshot || !forecast) {
    return null;
  }

  const offset = snapshot.utcOffsetSeconds;
  return {
    city: snapshot.cityName ?? fallbackCity,
    observedAtLabel: formatUnixTimestamp(snapshot.observedAt, offset),
    icon: weatherIcon(snapshot.condition ?? snapshot.description),
    description: snapshot.description === null ? "N/A" : titleCase(snapshot.description),
    temperature: roundWhole(snapshot.temperatureC),
    feelsLike: roundWhole(snapshot.feelsLikeC),
    humidity: roundWhole(snapshot.humidityPct),
    windKmh: roundWhole(snapshot.windSpeedKmh),
    windDirection: resolveCardinal(snapshot.windDeg),
    rainLabel:
      snapshot.rain1hMm > 0 ? `${formatFixed(snapshot.rain1hMm, 2)} mm/hr` : "No rain",
    sunriseLabel: snapshot.sunrise === null ? null : formatUnixTime(snapshot.sunrise, offset),
    sunsetLabel: snapshot.sunset === null ? null : formatUnixTime(snapshot.sunset, offset),
    slots: buildSlots(forecast),
    days: buildDays(forecast),
  };
}
