import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { logger } from '../../observability/logger.js';
import { registerCoxAiItineraryTool } from './cox-ai-itinerary.js';
import { registerGetActivitySuggestionsTool } from './get-activity-suggestions.js';
import { registerTravelPrompts } from './travel-prompts.js';
import { registerWeatherResources } from './weather-resources.js';

/**
 * Register the travel tools, weather resources and itinerary prompts.
 * None of them require a GitHub login.
 */
export function registerTravelTools(mcp: McpServer, deps: McpDeps): void {
  registerCoxAiItineraryTool(mcp, deps);
  registerGetActivitySuggestionsTool(mcp);
  registerWeatherResources(mcp, deps);
  registerTravelPrompts(mcp, deps);

  logger.debug('Travel tools registered');
}
