import fs from "node:fs/promises";
import path from "node:path";

const COMPASS_POINTS = [
  "N",
  "NNE",
  "NE",
  "ENE",
  "E",
  "ESE",
  "SE",
  "SSE",
  "S",
  "SSW",
  "SW",
  "WSW",
  "W",
  "WNW",
  "NW",
  "NNW",
] as const;

export type CompassPoint = (typeof COMPASS_POINTS)[number];

const SECTOR_WIDTH = 360 / COMPASS_POINTS.length;

const MONTHS_SHORT = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

const WEEKDAYS_SHORT = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await fs.mkdir(outputDir, { recursive: true });
}

export function buildWidgetPath(outputDir: string, dateLocal: string): string {
  return path.join(outputDir, `weather-widget-${dateLocal}.png`);
}

/** Maps a wind bearing onto the 16-point compass. Any real number is accepted. */
export function degreesToCardinal(degrees: number): CompassPoint {
  const sector = Math.floor((degrees + SECTOR_WIDTH / 2) / SECTOR_WIDTH);
  const index =
    ((sector % COMPASS_POINTS.length) + COMPASS_POINTS.length) %
    COMPASS_POINTS.length;
  return COMPASS_POINTS[index];
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) =>
      `${boundary}${letter.toUpperCase()}`
    );
}

/**
 * Fixed-point formatting that rounds exact ties to the even digit, so 36.5
 * gives "36" and 0.125 gives "0.12". Never returns "-0".
 */
export function formatFixed(value: number, digits = 0): string {
  let result = value.toFixed(digits);
  // Exact decimal expansion; a double near a tie differs from it well above 1e-20.
  const exact = Math.abs(value).toFixed(20);
  const point = exact.indexOf(".");
  if (/^50*$/.test(exact.slice(point + 1 + digits))) {
    const truncated = exact.slice(0, digits === 0 ? point : point + 1 + digits);
    // toFixed rounds ties away from zero; keep the truncated digits when they are even.
    if (Number(truncated[truncated.length - 1]) % 2 === 0) {
      result = value < 0 ? `-${truncated}` : truncated;
    }
  }
  return Number(result) === 0 ? result.replace(/^-/, "") : result;
}

export function roundWhole(value: number): number {
  return Number(formatFixed(value, 0));
}

export function msToKmh(metresPerSecond: number): number {
  return metresPerSecond * 3.6;
}

export interface LocalClock {
  weekday: string;
  day: number;
  month: string;
  year: number;
  hour: number;
  minute: number;
  dateLocal: string;
}

export function getLocalClock(date: Date, timeZone: string): LocalClock {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "numeric",
    hour: "numeric",
    minute: "2-digit",
    hourCycle: "h23",
  });
  const parts = formatter.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((entry) => entry.type === type)?.value ?? "";

  const year = Number.parseInt(part("year"), 10);
  const day = Number.parseInt(part("day"), 10);
  const monthIndex = new Intl.DateTimeFormat("en-US", {
    timeZone,
    month: "numeric",
  }).format(date);

  return {
    weekday: part("weekday"),
    day,
    month: part("month"),
    year,
    hour: Number.parseInt(part("hour"), 10) % 24,
    minute: Number.parseInt(part("minute"), 10),
    dateLocal: `${year}-${monthIndex.padStart(2, "0")}-${String(day).padStart(2, "0")}`,
  };
}

/** "03:05 PM": zero-padded 12-hour clock. */
export function formatClock12(hour: number, minute: number, padHour = true): string {
  const period = hour < 12 ? "AM" : "PM";
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  const hourText = padHour ? String(hour12).padStart(2, "0") : String(hour12);
  return `${hourText}:${String(minute).padStart(2, "0")} ${period}`;
}

function shiftedDate(unixSeconds: number, offsetSeconds: number): Date {
  return new Date((unixSeconds + offsetSeconds) * 1000);
}

/** "3:05 PM, Oct 07, 2026" in the location's own UTC offset. */
export function formatUnixTimestamp(unixSeconds: number, offsetSeconds: number): string {
  const local = shiftedDate(unixSeconds, offsetSeconds);
  const day = String(local.getUTCDate()).padStart(2, "0");
  return `${formatUnixTime(unixSeconds, offsetSeconds)}, ${MONTHS_SHORT[local.getUTCMonth()]} ${day}, ${local.getUTCFullYear()}`;
}

/** "3:05 PM" in the location's own UTC offset. */
export function formatUnixTime(unixSeconds: number, offsetSeconds: number): string {
  const local = shiftedDate(unixSeconds, offsetSeconds);
  return formatClock12(local.getUTCHours(), local.getUTCMinutes(), false);
}

export function localDateKey(unixSeconds: number, offsetSeconds: number): string {
  return shiftedDate(unixSeconds, offsetSeconds).toISOString().slice(0, 10);
}

export function localWeekdayShort(unixSeconds: number, offsetSeconds: number): string {
  return WEEKDAYS_SHORT[shiftedDate(unixSeconds, offsetSeconds).getUTCDay()];
}

export function weatherIcon(condition: string | null): string {
  const value = (condition ?? "").toLowerCase();
  if (value.includes("clear")) return "☀";
  if (value.includes("rain") || value.includes("drizzle")) return "🌧";
  if (value.includes("snow")) return "❄";
  if (value.includes("thunderstorm")) return "⛈";
  return "☁";
}
