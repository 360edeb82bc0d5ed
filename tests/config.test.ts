import { describe, expect, test } from "vitest";
import { ConfigMissingError, getEnvVar, loadConfig } from "../src/config.js";

const TWITTER_ENV = {
  TWITTER_API_KEY: "test-key",
  TWITTER_API_SECRET: "test-secret",
  TWITTER_ACCESS_TOKEN: "test-token",
  TWITTER_ACCESS_TOKEN_SECRET: "test-token-secret",
};

describe("loadConfig", () => {
  test("applies defaults", () => {
    const config = loadConfig({ ...TWITTER_ENV, WEATHER_API_KEY: "test-weather" });
    expect(config).toEqual({
      city: "Gachibowli",
      countryCode: "IN",
      region: "Hyderabad",
      timeZone: "Asia/Kolkata",
      weatherApiKey: "test-weather",
      weatherBaseUrl: "https://api.openweathermap.org/data/2.5",
      fetchTimeoutMs: 10000,
      publishEnabled: true,
      twitter: {
        apiKey: "test-key",
        apiSecret: "test-secret",
        accessToken: "test-token",
        accessTokenSecret: "test-token-secret",
      },
      outputDir: "./data",
    });
  });

  test("fails fast when publishing without credentials", () => {
    const env = { TWITTER_API_KEY: "test-key", TWITTER_ACCESS_TOKEN: "  " };
    expect(() => loadConfig(env)).toThrow(ConfigMissingError);
    try {
      loadConfig(env);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigMissingError);
      if (error instanceof ConfigMissingError) {
        expect(error.missing).toEqual([
          "TWITTER_API_SECRET",
          "TWITTER_ACCESS_TOKEN",
          "TWITTER_ACCESS_TOKEN_SECRET",
        ]);
      }
    }
  });

  test("preview mode does not need credentials", () => {
    const config = loadConfig({}, "preview");
    expect(config.publishEnabled).toBe(true);
    expect(config.twitter).toBeNull();
    expect(config.weatherApiKey).toBeUndefined();
  });

  test("disabled publishing does not need credentials", () => {
    const config = loadConfig({ POST_TO_TWITTER_ENABLED: "FALSE" });
    expect(config.publishEnabled).toBe(false);
    expect(config.twitter).toBeNull();
  });

  test("reads overrides and ignores bad timeouts", () => {
    const config = loadConfig({
      ...TWITTER_ENV,
      CITY: " Madhapur ",
      TIMEZONE: "Asia/Kolkata",
      FETCH_TIMEOUT_MS: "-5",
      OUTPUT_DIR: "/tmp/out",
    });
    expect(config.city).toBe("Madhapur");
    expect(config.fetchTimeoutMs).toBe(10000);
    expect(config.outputDir).toBe("/tmp/out");
    expect(loadConfig({ ...TWITTER_ENV, FETCH_TIMEOUT_MS: "2500" }).fetchTimeoutMs).toBe(2500);
  });
});

describe("getEnvVar", () => {
  test("trims values and treats blanks as missing", () => {
    expect(getEnvVar({ A: "  x " }, "A")).toBe("x");
    expect(getEnvVar({ A: "   " }, "A", "fallback")).toBe("fallback");
    expect(getEnvVar({}, "A")).toBeUndefined();
  });

  test("returns a string whenever a fallback is given", () => {
    const region: string = getEnvVar({}, "REGION", "Hyderabad");
    expect(region.toUpperCase()).toBe("HYDERABAD");
    expect(getEnvVar({ REGION: " Telangana " }, "REGION", "Hyderabad")).toBe("Telangana");
  });
});
