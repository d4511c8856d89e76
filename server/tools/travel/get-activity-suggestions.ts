import { z } from 'zod';
import type { McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';
import { formatTemperature, getActivitySuggestions, type TimeOfDay } from '../../travel/itinerary.js';

export function registerGetActivitySuggestionsTool(mcp: McpServer): void {
  mcp.registerTool(
    'get_activity_suggestions',
    {
      title: 'Activity Suggestions',
      description: "Suggest Cox's Bazar activities for a temperature and time of day.",
      inputSchema: {
        temperature: z.number().describe('Temperature in Celsius'),
        time_of_day: z.enum(['morning', 'afternoon', 'evening']).default('afternoon'),
      },
    },
    async ({ temperature, time_of_day }: { temperature: number; time_of_day: TimeOfDay }) => {
      const activities = getActivitySuggestions(temperature, time_of_day);
      const lines = activities.map((activity) => `- ${activity}`);
      return textResult(`Suggested activities for ${formatTemperature(temperature)} (${time_of_day}):\n${lines.join('\n')}`);
    },
  );
}
