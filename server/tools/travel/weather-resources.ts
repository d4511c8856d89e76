import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { jsonResource } from '../../mcp-core/tool-results.js';

export function registerWeatherResources(mcp: McpServer, { weather, now }: McpDeps): void {
  const today = () => now?.() ?? new Date();

  mcp.registerResource(
    'coxsbazar-current-weather',
    'weather://coxsbazar/current',
    {
      title: "Cox's Bazar Current Weather",
      description: "Current weather conditions for Cox's Bazar with today's forecast",
      mimeType: 'application/json',
    },
    async (uri) => jsonResource(uri, await weather.getCurrentReport(today())),
  );

  mcp.registerResource(
    'coxsbazar-weather-forecast',
    'weather://coxsbazar/forecast',
    {
      title: "Cox's Bazar 7-Day Forecast",
      description: "Detailed 7-day weather forecast for Cox's Bazar",
      mimeType: 'application/json',
    },
    async (uri) => jsonResource(uri, await weather.getForecastReport(today())),
  );

  mcp.registerResource(
    'coxsbazar-temperature-summary',
    'weather://coxsbazar/temperature-summary',
    {
      title: "Cox's Bazar Temperature Summary",
      description: "Temperature summary for the next 3 days in Cox's Bazar",
      mimeType: 'application/json',
    },
    async (uri) => jsonResource(uri, await weather.getTemperatureSummary(today())),
  );
}
