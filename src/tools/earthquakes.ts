import { z } from "zod";
import { defineTool, type ToolDefinition } from "./registry.js";
import { DEFAULT_HTTP_TIMEOUT_MS, getJson, type HttpToolOptions } from "./http.js";

// ── Earthquakes — USGS feed for the past 24 hours ────────

const FEED_URL = "https://earthquake.usgs.gov/earthquakes/feed/v1.0/summary/all_day.geojson";

/** Most quakes listed per observation. */
const MAX_LISTED = 5;

const FeedSchema = z.object({
  features: z.array(
    z.object({
      properties: z.object({
        mag: z.number().nullable(),
        place: z.string().nullable(),
        time: z.number().nullable(),
      }),
    }),
  ),
});

interface Quake {
  magnitude: number;
  location: string;
}

export function createEarthquakeTool(options: HttpToolOptions = {}): ToolDefinition {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  return defineTool({
    name: "get_earthquake_data",
    description: "Gets earthquakes from the last 24 hours (USGS), filtered by region and minimum magnitude.",
    example: 'get_earthquake_data("California", 4.0)',
    parameters: {
      region: z.coerce.string().trim().min(1).default("all").describe('Place name to match, or "all"'),
      min_magnitude: z.coerce.number().min(0).default(4.5).describe("Minimum magnitude"),
    },
    execute: async ({ region, min_magnitude }) => {
      const feed = await getJson(FEED_URL, {}, FeedSchema, timeoutMs);
      const needle = region.toLowerCase();

      const quakes: Quake[] = [];
      for (const { properties } of feed.features) {
        const magnitude = properties.mag ?? 0;
        const location = properties.place ?? "Unknown";
        if (magnitude < min_magnitude) continue;
        if (needle !== "all" && !location.toLowerCase().includes(needle)) continue;
        quakes.push({ magnitude, location });
      }

      if (quakes.length === 0) {
        return `No earthquakes with magnitude >= ${min_magnitude} found in the last 24 hours for region '${region}'`;
      }

      quakes.sort((a, b) => b.magnitude - a.magnitude);
      const lines = [
        `Found ${quakes.length} earthquake(s) with magnitude >= ${min_magnitude} in the last 24 hours:`,
        ...quakes.slice(0, MAX_LISTED).map((q) => `  - Magnitude ${q.magnitude}: ${q.location}`),
      ];
      return lines.join("\n");
    },
  });
}
