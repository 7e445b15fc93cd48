import { ToolRegistry } from "./registry.js";
import { calculator } from "./calculator.js";
import { createWeatherTool } from "./weather.js";
import { createEarthquakeTool } from "./earthquakes.js";
import { createArxivTool } from "./arxiv.js";
import { createCurrencyTool } from "./currency.js";
import type { HttpToolOptions } from "./http.js";

/** A fresh registry holding the built-in tools. Each caller gets its own. */
export function createDefaultRegistry(options: HttpToolOptions = {}): ToolRegistry {
  return new ToolRegistry()
    .register(calculator)
    .register(createWeatherTool(options))
    .register(createEarthquakeTool(options))
    .register(createArxivTool(options))
    .register(createCurrencyTool(options));
}
