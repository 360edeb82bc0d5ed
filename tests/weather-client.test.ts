import { describe, expect, test, vi } from "vitest";
import { OpenWeatherClient, parseCurrentWeather, parseForecast } from "../src/weather-client.js";
import { silentLogger } from "./fixtures.js";

const CURRENT_DOC = {
  name: "Gachibowli",
  dt: 1792229400,
  timezone: 19800,
  weather: [{ id: 800, main: "Clear", description: "clear sky", icon: "01d" }],
  main: { temp: 36.2, feels_like: 38.1, humidity: 40, pressure: 1008 },
  wind: { speed: 3, deg: 90 },
  sys: { country: "IN", sunrise: 1792197900, sunset: 1792240200 },
};

const FORECAST_DOC = {
  city: { name: "Gachibowli", timezone: 19800 },
  list: [
    { dt: 1792249200, main: { temp: 27.6 }, weather: [{ main: "Clouds", description: "few clouds" }], pop: 0.2 },
    { dt: 1792238400, main: { temp: 31.4 }, weather: [{ main: "Rain", description: "light rain" }], rain: { "3h": 0.4 }, wind: { speed: 5 } },
    { main: { temp: 10 } },
  ],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function client(): OpenWeatherClient {
  return new OpenWeatherClient({
    apiKey: "test-key",
    countryCode: "IN",
    baseUrl: "https://weather.test/data/2.5",
    timeoutMs: 1000,
    logger: silentLogger(),
  });
}

describe("parseCurrentWeather", () => {
  test("normalises units and fields", () => {
    expect(parseCurrentWeather(CURRENT_DOC)).toEqual({
      cityName: "Gachibowli",
      description: "clear sky",
      condition: "Clear",
      temperatureC: 36.2,
      feelsLikeC: 38.1,
      humidityPct: 40,
      windSpeedKmh: 3 * 3.6,
      windDeg: 90,
      rain1hMm: 0,
      observedAt: 1792229400,
      utcOffsetSeconds: 19800,
      sunrise: 1792197900,
      sunset: 1792240200,
    });
  });

  test("defaults absent fields", () => {
    const snapshot = parseCurrentWeather({ dt: 1, rain: { "1h": 1.2 } });
    expect(snapshot).toMatchObject({
      description: null,
      condition: null,
      temperatureC: 0,
      feelsLikeC: 0,
      humidityPct: 0,
      windSpeedKmh: 0,
      windDeg: 0,
      rain1hMm: 1.2,
      sunrise: null,
    });
  });
});

describe("parseForecast", () => {
  test("sorts entries by time and drops untimed items", () => {
    const series = parseForecast(FORECAST_DOC);
    expect(series?.utcOffsetSeconds).toBe(19800);
    expect(series?.entries.map((entry) => entry.time)).toEqual([1792238400, 1792249200]);
    expect(series?.entries[0]).toMatchObject({
      condition: "Rain",
      rain3hMm: 0.4,
      windSpeedKmh: 18,
      precipProbabilityPct: 0,
    });
    expect(series?.entries[1]?.precipProbabilityPct).toBe(20);
  });

  test("skips entries that are not objects", () => {
    const series = parseForecast({ list: [null, { dt: 1792238400, main: { temp: 31.4 } }] });
    expect(series?.entries).toHaveLength(1);
    expect(series?.entries[0]).toMatchObject({ time: 1792238400, temperatureC: 31.4 });
  });

  test("rejects a document without a list", () => {
    expect(parseForecast({ city: { timezone: 0 } })).toBeNull();
  });
});

describe("OpenWeatherClient", () => {
  test("requests metric current weather for the city and country", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(CURRENT_DOC)
    );
    vi.stubGlobal("fetch", fetchMock);

    const snapshot = await client().fetchCurrent("Gachibowli");

    expect(snapshot?.temperatureC).toBe(36.2);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      "https://weather.test/data/2.5/weather?q=Gachibowli%2CIN&appid=test-key&units=metric"
    );
  });

  test("fetches the forecast endpoint", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(FORECAST_DOC)
    );
    vi.stubGlobal("fetch", fetchMock);

    const series = await client().fetchForecast("Gachibowli");

    expect(series?.entries).toHaveLength(2);
    expect(String(fetchMock.mock.calls[0]?.[0])).toContain("/forecast?q=Gachibowli%2CIN");
  });

  test("returns null on a non-2xx response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ message: "city not found" }, 404)));
    await expect(client().fetchCurrent("Nowhere")).resolves.toBeNull();
  });

  test("returns null when the request throws", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    await expect(client().fetchForecast("Gachibowli")).resolves.toBeNull();
  });

  test("returns null for unexpected shapes", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse([1, 2, 3])));
    await expect(client().fetchCurrent("Gachibowli")).resolves.toBeNull();
    await expect(client().fetchForecast("Gachibowli")).resolves.toBeNull();
  });

  test("tolerates null entries in the forecast list", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ list: [null, { dt: 1 }] })));
    const series = await client().fetchForecast("Gachibowli");
    expect(series?.entries.map((entry) => entry.time)).toEqual([1]);
  });

  test("skips the request without an API key", async () => {
    const fetchMock = vi.fn(async () => jsonResponse(CURRENT_DOC));
    vi.stubGlobal("fetch", fetchMock);

    const keyless = new OpenWeatherClient({
      apiKey: undefined,
      countryCode: "IN",
      baseUrl: "https://weather.test/data/2.5",
      logger: silentLogger(),
    });
    await expect(keyless.fetchCurrent("Gachibowli")).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
