import { budgetMessage, MAX_POST_CHARS } from "./budget.js";
import { composeWeatherContent } from "./content.js";
import type {
  ArtifactStore,
  BudgetedMessage,
  ComposedMessage,
  CycleFailureReason,
  CycleOutcome,
  CycleStage,
  ImageArtifact,
  ImageRenderer,
  Logger,
  PreviewOutcome,
  Publisher,
  WeatherSource,
} from "./types.js";
import { degreesToCardinal } from "./utils.js";
import { buildWidgetBindings } from "./widget.js";

export interface PublishCycleSettings {
  city: string;
  region: string;
  timeZone: string;
  publishEnabled: boolean;
  maxChars?: number;
}

export interface PublishCycleDeps {
  weather: WeatherSource;
  renderer: ImageRenderer;
  artifacts: ArtifactStore;
  /** Null when publishing is disabled or no credentials are configured. */
  publisher: Publisher | null;
  logger?: Logger;
  now?: () => Date;
}

interface Failure {
  status: "failed";
  stage: CycleStage;
  reason: CycleFailureReason;
  message: string;
}

interface Prepared {
  image: Buffer;
  composed: ComposedMessage;
  budgeted: BudgetedMessage;
}

/**
 * One fetch → render → compose → publish pass for a single city. The
 * instance holds configuration only, so calls are independent.
 */
export class PublishCycle {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly settings: PublishCycleSettings,
    private readonly deps: PublishCycleDeps
  ) {
    this.logger = deps.logger ?? console;
    this.now = deps.now ?? (() => new Date());
  }

  async runPublishCycle(): Promise<CycleOutcome> {
    const { city } = this.settings;
    this.logger.log(`--- Running weather post job for ${city} ---`);

    const prepared = await this.prepare();
    if (prepared.status === "failed") {
      return prepared;
    }

    let artifact: ImageArtifact;
    try {
      artifact = await this.deps.artifacts.save(prepared.image);
    } catch (error) {
      this.logger.error(`Could not write weather image for ${city}`, error);
      return this.fail("build_image", "render_failure", "Could not write image artifact");
    }

    try {
      return await this.publish(prepared, artifact);
    } finally {
      await this.cleanup(artifact);
    }
  }

  async previewCycle(): Promise<PreviewOutcome> {
    this.logger.log(`--- Previewing weather post for ${this.settings.city} ---`);
    const prepared = await this.prepare();
    if (prepared.status === "failed") {
      return prepared;
    }
    return {
      status: "ok",
      lines: prepared.composed.lines,
      hashtags: prepared.budgeted.hashtags,
      text: prepared.budgeted.text,
      image: prepared.image,
    };
  }

  private async prepare(): Promise<(Prepared & { status: "ready" }) | Failure> {
    const { city, region, timeZone } = this.settings;

    const [current, forecast] = await Promise.all([
      this.deps.weather.fetchCurrent(city),
      this.deps.weather.fetchForecast(city),
    ]);
    if (!current) {
      this.logger.warn(`Could not retrieve current weather for ${city}. Aborting.`);
      return this.fail("fetch_current", "fetch_failure", `No current weather for ${city}`);
    }
    if (!forecast) {
      this.logger.warn(`Could not retrieve forecast for ${city}. Aborting.`);
      return this.fail("fetch_forecast", "fetch_failure", `No forecast for ${city}`);
    }

    const bindings = buildWidgetBindings(current, forecast, degreesToCardinal, city);
    const image = bindings ? await this.deps.renderer.render(bindings) : null;
    if (!image) {
      this.logger.warn("Failed to create weather image. Aborting post.");
      return this.fail("build_image", "render_failure", "Weather image could not be rendered");
    }

    const composed = composeWeatherContent(city, current, this.now(), timeZone, { city, region });
    const budgeted = budgetMessage(
      composed.lines,
      composed.hashtags,
      this.settings.maxChars ?? MAX_POST_CHARS
    );
    if (!budgeted.withinBudget) {
      this.logger.warn(`Post body is ${budgeted.length} chars, over the limit even without hashtags`);
    }

    return { status: "ready", image, composed, budgeted };
  }

  private async publish(prepared: Prepared, artifact: ImageArtifact): Promise<CycleOutcome> {
    const { city } = this.settings;
    const text = prepared.budgeted.text;

    if (!this.settings.publishEnabled) {
      this.logger.log(`[TEST MODE] Skipping post. Content:\n${text}`);
      return { status: "skipped", text };
    }
    if (!this.deps.publisher) {
      this.logger.error("Post prerequisites not met: no publisher configured. Aborting.");
      return this.fail("publish", "precondition_not_met", "No publisher configured");
    }

    const result = await this.deps.publisher.publish({ text, image: artifact });
    if (!result.ok) {
      this.logger.warn(`Weather post for ${city} did not complete: ${result.reason}`);
      return this.fail("publish", result.reason, result.message);
    }

    this.logger.log(`Weather post for ${city} completed successfully.`);
    return { status: "success", text, postId: result.postId };
  }

  private async cleanup(artifact: ImageArtifact): Promise<void> {
    try {
      await this.deps.artifacts.remove(artifact);
    } catch (error) {
      this.logger.error(`Failed to remove temporary image ${artifact.path}`, error);
    }
  }

  private fail(stage: CycleStage, reason: CycleFailureReason, message: string): Failure {
    return { status: "failed", stage, reason, message };
  }
}
