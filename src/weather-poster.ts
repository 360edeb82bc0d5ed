#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs/promises";
import { TempFileArtifactStore } from "./artifacts.js";
import { type AppConfig, ConfigMissingError, loadConfig, type RunMode } from "./config.js";
import { PublishCycle } from "./publish-cycle.js";
import { SharpRenderer } from "./renderer.js";
import { createTwitterClient, TwitterPublisher } from "./twitter-publisher.js";
import { buildWidgetPath, ensureOutputDir, getLocalClock } from "./utils.js";
import { OpenWeatherClient } from "./weather-client.js";

function parseMode(arg: string | undefined): RunMode | null {
  if (arg === undefined || arg === "run") {
    return "run";
  }
  return arg === "preview" ? "preview" : null;
}

function createPublishCycle(config: AppConfig): PublishCycle {
  const publisher =
    config.publishEnabled && config.twitter
      ? new TwitterPublisher(createTwitterClient(config.twitter))
      : null;

  return new PublishCycle(
    {
      city: config.city,
      region: config.region,
      timeZone: config.timeZone,
      publishEnabled: config.publishEnabled,
    },
    {
      weather: new OpenWeatherClient({
        apiKey: config.weatherApiKey,
        countryCode: config.countryCode,
        baseUrl: config.weatherBaseUrl,
        timeoutMs: config.fetchTimeoutMs,
      }),
      renderer: new SharpRenderer(),
      artifacts: new TempFileArtifactStore(),
      publisher,
    }
  );
}

async function runOnce(cycle: PublishCycle): Promise<boolean> {
  const outcome = await cycle.runPublishCycle();
  switch (outcome.status) {
    case "success":
      console.log(`Posted weather update ${outcome.postId}`);
      return true;
    case "skipped":
      console.log("Publishing disabled; weather post skipped.");
      return true;
    case "failed":
      console.error(`Weather post failed at ${outcome.stage} (${outcome.reason}): ${outcome.message}`);
      return false;
  }
}

async function previewOnce(cycle: PublishCycle, config: AppConfig): Promise<boolean> {
  const outcome = await cycle.previewCycle();
  if (outcome.status === "failed") {
    console.error(`Preview failed at ${outcome.stage} (${outcome.reason}): ${outcome.message}`);
    return false;
  }

  await ensureOutputDir(config.outputDir);
  const dateLocal = getLocalClock(new Date(), config.timeZone).dateLocal;
  const imagePath = buildWidgetPath(config.outputDir, dateLocal);
  await fs.writeFile(imagePath, outcome.image);
  console.log(`${outcome.text}\n\nWidget written to ${imagePath}`);
  return true;
}

async function main(): Promise<void> {
  const mode = parseMode(process.argv[2]);
  if (!mode) {
    console.error("Usage: weather-poster [run|preview]");
    process.exitCode = 2;
    return;
  }

  let config: AppConfig;
  try {
    config = loadConfig(process.env, mode);
  } catch (error) {
    if (error instanceof ConfigMissingError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (!config.publishEnabled) {
    console.warn("X/Twitter interactions are DISABLED (test mode).");
  }

  const cycle = createPublishCycle(config);
  const ok = mode === "run" ? await runOnce(cycle) : await previewOnce(cycle, config);
  if (!ok) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Weather poster failed", error);
  process.exitCode = 1;
});
