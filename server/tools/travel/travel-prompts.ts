/**
 * Travel prompts
 *
 * Prompt arguments arrive as strings. `temperatures` is an optional
 * comma-separated list; without it the forecast is fetched.
 */

import { z } from 'zod';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { GetPromptResult, McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { parseStartDate, validateDays } from '../../travel/itinerary.js';
import {
  fitTemperatures,
  generateDetailedItineraryPrompt,
  generateItineraryPrompt,
  parseTemperatureList,
  suggestActivitiesPrompt,
} from '../../travel/prompts.js';
import { DEFAULT_MAX_TEMP } from '../../travel/weather.js';

interface TripArgs {
  days: string;
  start_date: string;
  temperatures?: string;
}

interface DetailedTripArgs extends TripArgs {
  budget?: string;
  interests?: string;
}

function userPrompt(text: string): GetPromptResult {
  return { messages: [{ role: 'user', content: { type: 'text', text } }] };
}

function parseNumberArg(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new McpError(ErrorCode.InvalidParams, `${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function registerTravelPrompts(mcp: McpServer, { weather, now }: McpDeps): void {
  async function resolveTrip(args: TripArgs) {
    const days = validateDays(parseNumberArg('days', args.days));
    const startDate = parseStartDate(args.start_date, now?.());

    let temperatures: number[];
    if (args.temperatures !== undefined && args.temperatures.trim() !== '') {
      const parsed = parseTemperatureList(args.temperatures);
      if (!parsed) {
        throw new McpError(ErrorCode.InvalidParams, 'temperatures must be a comma-separated list of numbers');
      }
      temperatures = fitTemperatures(parsed, days, DEFAULT_MAX_TEMP);
    } else {
      temperatures = await weather.getTemperatureForecast(startDate, days);
    }
    return { days, startDate, temperatures };
  }

  const tripArgs = {
    days: z.string().describe('Number of days for the trip (1-14)'),
    start_date: z.string().describe('Start date, e.g. "2025-01-15" or "today"'),
    temperatures: z.string().optional().describe('Comma-separated daily temperatures in °C; fetched when omitted'),
  };

  mcp.registerPrompt(
    'generate_itinerary',
    {
      title: "Cox's Bazar AI Itinerary",
      description: 'Generate a day-by-day itinerary from the trip length, start date and daily temperatures',
      argsSchema: tripArgs,
    },
    async (args: TripArgs) => userPrompt(generateItineraryPrompt(await resolveTrip(args))),
  );

  mcp.registerPrompt(
    'generate_detailed_itinerary',
    {
      title: "Detailed Cox's Bazar Itinerary",
      description: 'Generate a detailed itinerary with a budget level and interests',
      argsSchema: {
        ...tripArgs,
        budget: z.string().optional().describe('"budget", "moderate" or "luxury"'),
        interests: z.string().optional().describe('Comma-separated interests, e.g. "adventure, culture"'),
      },
    },
    async (args: DetailedTripArgs) => {
      const trip = await resolveTrip(args);
      const interests = args.interests
        ?.split(',')
        .map((interest) => interest.trim())
        .filter(Boolean);
      return userPrompt(generateDetailedItineraryPrompt({ ...trip, budget: args.budget || undefined, interests }));
    },
  );

  mcp.registerPrompt(
    'suggest_activities',
    {
      title: 'Activity Suggestions',
      description: 'Suggest activities based on weather conditions',
      argsSchema: {
        temperature: z.string().describe('Temperature in °C'),
        weather_condition: z.string().optional().describe('e.g. "clear", "rainy", "cloudy"'),
      },
    },
    async ({ temperature, weather_condition }: { temperature: string; weather_condition?: string }) =>
      userPrompt(suggestActivitiesPrompt(parseNumberArg('temperature', temperature), weather_condition || undefined)),
  );
}
