// Raw OpenWeatherMap documents. Every field is optional upstream.

export interface OwmCondition {
  id?: number;
  main?: string;
  description?: string;
  icon?: string;
}

export interface OwmMain {
  temp?: number;
  feels_like?: number;
  temp_min?: number;
  temp_max?: number;
  pressure?: number;
  humidity?: number;
}

export interface OwmWind {
  speed?: number;
  deg?: number;
  gust?: number;
}

export interface CurrentWeatherDocument {
  name?: string;
  dt?: number;
  timezone?: number;
  weather?: OwmCondition[];
  main?: OwmMain;
  wind?: OwmWind;
  rain?: { "1h"?: number; "3h"?: number };
  sys?: { country?: string; sunrise?: number; sunset?: number };
}

export interface ForecastItemDocument {
  dt?: number;
  main?: OwmMain;
  weather?: OwmCondition[];
  wind?: OwmWind;
  rain?: { "3h"?: number };
  pop?: number;
}

export interface ForecastDocument {
  list?: Array<ForecastItemDocument | null>;
  city?: { name?: string; timezone?: number; sunrise?: number; sunset?: number };
}

// Normalised records the pipeline works with.

export interface WeatherSnapshot {
  cityName: string | null;
  description: string | null;
  condition: string | null;
  temperatureC: number;
  feelsLikeC: number;
  humidityPct: number;
  windSpeedKmh: number;
  windDeg: number;
  rain1hMm: number;
  observedAt: number;
  utcOffsetSeconds: number;
  sunrise: number | null;
  sunset: number | null;
}

export interface ForecastEntry {
  time: number;
  description: string | null;
  condition: string | null;
  temperatureC: number;
  feelsLikeC: number;
  humidityPct: number;
  windSpeedKmh: number;
  windDeg: number;
  rain3hMm: number;
  precipProbabilityPct: number;
}

export interface ForecastSeries {
  entries: ForecastEntry[];
  utcOffsetSeconds: number;
}

export interface ComposedMessage {
  lines: string[];
  hashtags: string[];
}

export interface BudgetedMessage {
  text: string;
  hashtags: string[];
  length: number;
  withinBudget: boolean;
}

export interface ForecastSlotBinding {
  timeLabel: string;
  icon: string;
  temperature: number;
  precipProbabilityPct: number;
}

export interface DailySummaryBinding {
  dayLabel: string;
  high: number;
  low: number;
  icon: string;
}

export interface WidgetBindings {
  city: string;
  observedAtLabel: string;
  icon: string;
  description: string;
  temperature: number;
  feelsLike: number;
  humidity: number;
  windKmh: number;
  windDirection: string;
  rainLabel: string;
  sunriseLabel: string | null;
  sunsetLabel: string | null;
  slots: ForecastSlotBinding[];
  days: DailySummaryBinding[];
}

export interface ImageArtifact {
  path: string;
  bytes: Buffer;
}

export interface PublishRequest {
  text: string;
  image: ImageArtifact;
}

export type PublishFailureReason =
  | "rate_limited"
  | "transport_error"
  | "precondition_not_met";

export type PublishResult =
  | { ok: true; postId: string }
  | { ok: false; reason: PublishFailureReason; message: string };

export type CycleStage =
  | "fetch_current"
  | "fetch_forecast"
  | "build_image"
  | "publish";

export type CycleFailureReason =
  | "fetch_failure"
  | "render_failure"
  | PublishFailureReason;

export type CycleOutcome =
  | { status: "success"; text: string; postId: string }
  | { status: "skipped"; text: string }
  | {
      status: "failed";
      stage: CycleStage;
      reason: CycleFailureReason;
      message: string;
    };

export type PreviewOutcome =
  | {
      status: "ok";
      lines: string[];
      hashtags: string[];
      text: string;
      image: Buffer;
    }
  | {
      status: "failed";
      stage: CycleStage;
      reason: CycleFailureReason;
      message: string;
    };

// Collaborators the orchestrator is built from.

export interface WeatherSource {
  fetchCurrent(city: string): Promise<WeatherSnapshot | null>;
  fetchForecast(city: string): Promise<ForecastSeries | null>;
}

export interface ImageRenderer {
  render(bindings: WidgetBindings): Promise<Buffer | null>;
}

export interface Publisher {
  publish(request: PublishRequest): Promise<PublishResult>;
}

export interface ArtifactStore {
  save(bytes: Buffer): Promise<ImageArtifact>;
  remove(artifact: ImageArtifact): Promise<void>;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
