import { z } from "zod";
import { defineTool, type ToolDefinition } from "./registry.js";
import { DEFAULT_HTTP_TIMEOUT_MS, getJson, type HttpToolOptions } from "./http.js";

// ── Weather — Open-Meteo (no API key required) ───────────

const GEOCODE_URL = "https://geocoding-api.open-meteo.com/v1/search";
const FORECAST_URL = "https://api.open-meteo.com/v1/forecast";

const GeocodeSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        latitude: z.number(),
        longitude: z.number(),
        country: z.string().optional(),
      }),
    )
    .optional(),
});

const ForecastSchema = z.object({
  current: z.object({
    temperature_2m: z.number(),
    relative_humidity_2m: z.number(),
    weather_code: z.number().optional(),
  }),
});

/** Coarse WMO weather-code groups. */
export function describeWeatherCode(code: number): string {
  if (code === 0) return "Clear sky";
  if (code <= 3) return "Partly cloudy";
  if (code <= 48) return "Fog";
  if (code <= 57) return "Drizzle";
  if (code <= 67) return "Rain";
  if (code <= 77) return "Snow";
  if (code <= 82) return "Rain showers";
  if (code <= 86) return "Snow showers";
  return "Thunderstorm";
}

export function createWeatherTool(options: HttpToolOptions = {}): ToolDefinition {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  return defineTool({
    name: "get_weather",
    description: "Gets the current weather (°F, humidity, conditions) for a city.",
    example: 'get_weather("Boise")',
    parameters: {
      location: z.coerce.string().trim().min(1).describe('City name, e.g. "New York"'),
    },
    execute: async ({ location }) => {
      const geocode = await getJson(
        GEOCODE_URL,
        { name: location, count: 1, language: "en", format: "json" },
        GeocodeSchema,
        timeoutMs,
      );
      const place = geocode.results?.[0];
      if (!place) {
        return `Weather error: Could not find location '${location}'`;
      }

      const forecast = await getJson(
        FORECAST_URL,
        {
          latitude: place.latitude,
          longitude: place.longitude,
          current: "temperature_2m,relative_humidity_2m,weather_code",
          temperature_unit: "fahrenheit",
          timezone: "auto",
        },
        ForecastSchema,
        timeoutMs,
      );

      const { temperature_2m, relative_humidity_2m, weather_code } = forecast.current;
      const placeName = place.country ? `${place.name}, ${place.country}` : place.name;
      const conditions =
        weather_code === undefined ? "" : `, Conditions: ${describeWeatherCode(weather_code)}`;
      return `Weather in ${placeName}: Temperature: ${temperature_2m}°F, Humidity: ${relative_humidity_2m}%${conditions}`;
    },
  });
}
