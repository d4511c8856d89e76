/**
 * cox_ai_itinerary
 *
 * Builds an itinerary brief for Cox's Bazar: trip details, a per-day
 * forecast with activity suggestions, and the two prompts an assistant can
 * run to write the final itinerary.
 *
 * A one-day trip triggers an elicitation asking the user to extend it.
 * Clients without elicitation support get a one-day plan with a note.
 */

import { z } from 'zod';
import type { ElicitResult } from '@modelcontextprotocol/sdk/types.js';
import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';
import { errorMessage } from '../../oauth/errors.js';
import { logger } from '../../observability/logger.js';
import {
  formatTemperature,
  getActivitySuggestions,
  parseStartDate,
  validateDays,
} from '../../travel/itinerary.js';
import { generateItineraryPrompt, weatherBasedActivitiesPrompt } from '../../travel/prompts.js';
import type { WeatherForecast } from '../../travel/weather.js';

export const CANCELLED_SHORT_TRIP =
  '[CANCELLED] Itinerary generation cancelled. Please plan for at least 2 days for a better experience.';
export const CANCELLED_BY_USER = '[CANCELLED] Itinerary generation cancelled by user.';
export const ELICITATION_UNSUPPORTED_NOTE =
  'ℹ️ NOTE: Your MCP client does not support interactive elicitation. ' +
  'We recommend at least 2 days for a better travel experience. Proceeding with a 1-day itinerary.';

type TripLengthDecision =
  | { kind: 'proceed'; days: number; note?: string }
  | { kind: 'cancelled'; message: string };

/**
 * Ask the user whether a one-day trip should be extended
 */
async function confirmTripLength(mcp: McpServer, startDate: string): Promise<TripLengthDecision> {
  if (!mcp.server.getClientCapabilities()?.elicitation) {
    logger.info('Client does not support elicitation, keeping a 1-day itinerary');
    return { kind: 'proceed', days: 1, note: ELICITATION_UNSUPPORTED_NOTE };
  }

  let result: ElicitResult;
  try {
    result = await mcp.server.elicitInput({
      message:
        `⚠️ Only 1 day detected for your itinerary starting on ${startDate}! ` +
        'For a meaningful travel experience, we recommend at least 2 days. ' +
        'Would you like to extend your trip to 2 or more days?',
      requestedSchema: {
        type: 'object',
        properties: {
          extendTrip: {
            type: 'boolean',
            title: 'Extend trip',
            description: 'Would you like to extend your trip to the recommended minimum of 2 days?',
          },
          newDays: {
            type: 'integer',
            title: 'Number of days',
            description: 'Number of days for the extended trip (minimum 2)',
            minimum: 2,
            maximum: 14,
          },
        },
        required: ['extendTrip'],
      },
    });
  } catch (error) {
    logger.warn('Elicitation failed, keeping a 1-day itinerary', { error: errorMessage(error) });
    return { kind: 'proceed', days: 1, note: ELICITATION_UNSUPPORTED_NOTE };
  }

  if (result.action !== 'accept' || !result.content) {
    return { kind: 'cancelled', message: CANCELLED_BY_USER };
  }
  if (result.content.extendTrip !== true) {
    return { kind: 'cancelled', message: CANCELLED_SHORT_TRIP };
  }

  const requested = result.content.newDays;
  const newDays = typeof requested === 'number' ? requested : 2;
  return { kind: 'proceed', days: validateDays(Math.max(newDays, 2)) };
}

export function renderItineraryPlan(weather: WeatherForecast, days: number, note?: string): string {
  const sections: string[] = ["# Cox's Bazar Itinerary Planning", ''];
  if (note) {
    sections.push(note, '');
  }

  sections.push(
    '## Trip Details',
    `- **Location:** ${weather.location}`,
    `- **Start Date:** ${weather.startDate}`,
    `- **Duration:** ${days} day(s)`,
    `- **Timezone:** ${weather.timezone}`,
    '',
    '## Weather Forecast',
    '',
  );
  if (!weather.live) {
    sections.push('_Live forecast unavailable; typical values are shown._', '');
  }

  for (const day of weather.forecast) {
    const morning = getActivitySuggestions(day.tempAvg - 2, 'morning').slice(0, 2);
    const afternoon = getActivitySuggestions(day.tempAvg, 'afternoon').slice(0, 2);
    const evening = getActivitySuggestions(day.tempAvg, 'evening').slice(0, 2);

    sections.push(
      `### Day ${day.day} - ${day.date}`,
      `- **Weather:** ${day.weather}`,
      `- **Temperature:** ${day.tempMin}°C - ${day.tempMax}°C (Average: ${formatTemperature(day.tempAvg)})`,
      `- **Precipitation:** ${day.precipitation}mm`,
      `- **Wind Speed:** ${day.windspeed} km/h`,
      `- **Sunrise:** ${day.sunrise} | **Sunset:** ${day.sunset}`,
      '',
      '**Activity Suggestions:**',
      `- **Morning:** ${morning.join(', ')}`,
      `- **Afternoon:** ${afternoon.join(', ')}`,
      `- **Evening:** ${evening.join(', ')}`,
      '',
    );
  }

  return sections.join('\n');
}

export function registerCoxAiItineraryTool(mcp: McpServer, { weather, now }: McpDeps): void {
  mcp.registerTool(
    'cox_ai_itinerary',
    {
      title: "Cox's Bazar AI Itinerary",
      description:
        "Plan a trip to Cox's Bazar: fetches the daily forecast and returns suggestions plus prompts for generating a detailed itinerary.",
      inputSchema: {
        start_date: z.string().describe('Start date, e.g. "2025-01-15", "15 Jan 2025" or "today"'),
        days: z.number().int().describe('Number of days for the trip (1-14)'),
      },
    },
    async ({ start_date, days }: { start_date: string; days: number }) => {
      logger.info('cox_ai_itinerary called', { start_date, days });

      let tripDays = validateDays(days);
      let note: string | undefined;
      if (tripDays === 1) {
        const decision = await confirmTripLength(mcp, start_date);
        if (decision.kind === 'cancelled') {
          return textResult(decision.message);
        }
        tripDays = decision.days;
        note = decision.note;
      }

      const startDate = parseStartDate(start_date, now?.());
      const forecast = await weather.getWeatherForecast(startDate, tripDays);
      const basePrompt = generateItineraryPrompt({
        days: tripDays,
        startDate,
        temperatures: forecast.forecast.map((day) => day.tempMax),
      });

      const text = [
        renderItineraryPlan(forecast, tripDays, note),
        '---',
        '',
        '## AI Itinerary Generation Prompt',
        '',
        basePrompt,
        '',
        '---',
        '',
        '## Weather-Based Activities Prompt',
        '',
        weatherBasedActivitiesPrompt(forecast),
        '',
        '---',
        '',
        '**Note:** Use the above prompts with an AI assistant to generate a detailed, personalized itinerary based on the weather forecast and your preferences.',
      ].join('\n');

      return textResult(text);
    },
  );
}
