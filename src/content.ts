import { generateHashtags, type HashtagPolicy } from "./hashtags.js";
import type { ComposedMessage, WeatherSnapshot } from "./types.js";
import {
  degreesToCardinal,
  formatClock12,
  formatFixed,
  getLocalClock,
  roundWhole,
  titleCase,
} from "./utils.js";

export const MISSING_DATA_LINE = "Could not generate weather report: Data missing.";
export const ERROR_HASHTAGS = ["#error"];

export function closingRemark(snapshot: WeatherSnapshot): string {
  if (snapshot.rain1hMm > 0.5) {
    return "Stay dry out there! 🌧️";
  }
  if (snapshot.temperatureC > 35) {
    return "It's a hot one! Stay cool & hydrated. ☀️";
  }
  if (snapshot.temperatureC < 18) {
    return "Brr, it's cool! Consider a light jacket. 🧣";
  }
  return "Enjoy your day! 😊";
}

export function composeWeatherContent(
  city: string,
  snapshot: WeatherSnapshot | null,
  now: Date,
  timeZone: string,
  policy: HashtagPolicy
): ComposedMessage {
  if (!snapshot) {
    return { lines: [MISSING_DATA_LINE], hashtags: [...ERROR_HASHTAGS] };
  }

  const clock = getLocalClock(now, timeZone);
  const sky = snapshot.description === null ? "N/A" : titleCase(snapshot.description);
  const rainLine =
    snapshot.rain1hMm > 0
      ? `☔ Rain: ${formatFixed(snapshot.rain1hMm, 2)} mm/hr`
      : "☔ No Rain";

  const lines = [
    `Hello, ${city}!👋, ${clock.weekday} weather at ${clock.day} ${clock.month}, ${formatClock12(clock.hour, clock.minute)}:`,
    `☁️ Sky: ${sky}`,
    `🌡️ Temp: ${roundWhole(snapshot.temperatureC)}°C (feels: ${roundWhole(snapshot.feelsLikeC)}°C)`,
    `💧 Humidity: ${roundWhole(snapshot.humidityPct)}%`,
    `💨 Wind: ${roundWhole(snapshot.windSpeedKmh)} km/h from the ${degreesToCardinal(snapshot.windDeg)}`,
    rainLine,
    "",
    closingRemark(snapshot),
  ];

  return { lines, hashtags: generateHashtags(snapshot, clock.weekday, policy) };
}
