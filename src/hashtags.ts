import type { WeatherSnapshot } from "./types.js";

export interface HashtagPolicy {
  city: string;
  region: string;
}

const CATEGORY_TAG = "#weatherupdate";
const HEATWAVE_THRESHOLD_C = 35;
const WINDY_THRESHOLD_KMH = 25;
const WEEKEND_DAYS = new Set(["Saturday", "Sunday"]);

function toTag(name: string): string {
  return `#${name.replace(/[^\p{L}\p{N}_]/gu, "")}`;
}

/**
 * Builds the hashtag list for a post. Base tags come first and conditional
 * tags follow in a fixed order; the budgeter trims from the end, so the
 * order here is also the order of significance.
 */
export function generateHashtags(
  snapshot: WeatherSnapshot,
  weekday: string,
  policy: HashtagPolicy
): string[] {
  const tags = new Set<string>([
    toTag(policy.city),
    toTag(policy.region),
    CATEGORY_TAG,
  ]);

  if (snapshot.rain1hMm > 0) {
    tags.add(toTag(`${policy.region}Rains`));
    tags.add("#rain");
  }
  if (snapshot.temperatureC > HEATWAVE_THRESHOLD_C) {
    tags.add("#Heatwave");
  }
  if ((snapshot.description ?? "").toLowerCase().includes("clear")) {
    tags.add("#SunnyDay");
  }
  if (snapshot.windSpeedKmh > WINDY_THRESHOLD_KMH) {
    tags.add("#windy");
  }
  if (WEEKEND_DAYS.has(weekday)) {
    tags.add("#WeekendWeather");
  }

  return [...tags];
}
