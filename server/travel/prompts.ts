/**
 * Prompt text for itinerary generation
 *
 * Pure builders shared by the registered MCP prompts and the
 * `cox_ai_itinerary` tool.
 */

import { addDays, formatDate } from './itinerary.js';
import type { WeatherForecast } from './weather.js';

export type BudgetLevel = 'budget' | 'moderate' | 'luxury';

export const DEFAULT_INTERESTS = ['beaches', 'local culture', 'food'];

const BUDGET_GUIDELINES: Record<BudgetLevel, string> = {
  budget: 'Focus on affordable options, local eateries, free activities, budget hotels (1000-2000 BDT/night)',
  moderate: 'Mix of mid-range restaurants, popular attractions, comfortable hotels (3000-5000 BDT/night)',
  luxury: 'Premium experiences, fine dining, luxury resorts (8000+ BDT/night), private tours',
};

export interface ItineraryPromptInput {
  days: number;
  startDate: Date;
  temperatures: number[];
}

export interface DetailedItineraryPromptInput extends ItineraryPromptInput {
  budget?: string;
  interests?: string[];
}

function isBudgetLevel(value: string): value is BudgetLevel {
  return value === 'budget' || value === 'moderate' || value === 'luxury';
}

export function generateItineraryPrompt({ days, startDate, temperatures }: ItineraryPromptInput): string {
  let prompt =
    `You are a travel expert. Generate a ${days}-day itinerary for Cox's Bazar, Bangladesh. ` +
    `The trip starts on ${formatDate(startDate)}. ` +
    'Include morning, afternoon, and evening activities for each day. ' +
    "Each day's activities should consider the following temperatures in °C:\n";

  temperatures.forEach((temperature, i) => {
    prompt += `- ${formatDate(addDays(startDate, i))}: ${temperature.toFixed(1)}°C\n`;
  });

  prompt +=
    '\nMake the itinerary creative, diverse, enjoyable, and unique for each day. ' +
    'Suggest beaches, sightseeing, food, and local experiences.';
  return prompt;
}

export function generateDetailedItineraryPrompt(input: DetailedItineraryPromptInput): string {
  const budget = input.budget ?? 'moderate';
  const interests = input.interests && input.interests.length > 0 ? input.interests : DEFAULT_INTERESTS;
  const guidelines = isBudgetLevel(budget) ? BUDGET_GUIDELINES[budget] : BUDGET_GUIDELINES.moderate;

  const lines = [
    `🌴 CREATE A DETAILED ${input.days}-DAY ITINERARY FOR COX'S BAZAR, BANGLADESH`,
    '',
    `📅 Start Date: ${formatDate(input.startDate)}`,
    `💰 Budget Level: ${budget.toUpperCase()}`,
    `🎯 Interests: ${interests.join(', ')}`,
    '',
    '🌡️ DAILY TEMPERATURES:',
    ...input.temperatures.map(
      (temperature, i) => `  Day ${i + 1} (${formatDate(addDays(input.startDate, i))}): ${temperature.toFixed(1)}°C`,
    ),
    '',
    '💵 BUDGET GUIDELINES:',
    guidelines,
    '',
    '📋 REQUIREMENTS:',
    'For each day, provide:',
    '1. Morning activities (with specific timings)',
    '2. Lunch recommendations (restaurant names & dishes)',
    '3. Afternoon activities',
    '4. Evening activities',
    '5. Dinner recommendations',
    '6. Estimated daily costs in BDT',
    '7. Travel tips and weather considerations',
    '',
    `🎯 Focus on: ${interests.join(', ')}`,
    'Make it creative, practical, and tailored to the temperature conditions!',
  ];
  return lines.join('\n');
}

export function suggestActivitiesPrompt(temperature: number, weatherCondition = 'clear'): string {
  return [
    "Suggest activities for Cox's Bazar with current conditions:",
    `🌡️ Temperature: ${temperature.toFixed(1)}°C`,
    `🌤️ Weather: ${weatherCondition}`,
    '',
    'Provide:',
    '- 5 suitable activities',
    '- Why each activity is good for these conditions',
    '- Estimated duration and cost in BDT',
    '- Safety tips if needed',
    '',
  ].join('\n');
}

/**
 * Ask for activities that fit each forecast day's conditions
 */
export function weatherBasedActivitiesPrompt(weather: WeatherForecast): string {
  const days = weather.forecast.map(
    (day) =>
      `- Day ${day.day} (${day.date}): ${day.weather}, ${day.tempMin.toFixed(1)}-${day.tempMax.toFixed(1)}°C, ` +
      `${day.precipitation}mm rain, wind ${day.windspeed} km/h`,
  );

  return [
    `Suggest activities for a trip to ${weather.location} that suit the forecast below.`,
    '',
    ...days,
    '',
    'For each day:',
    '- Prefer outdoor and beach activities on dry, mild days',
    '- Offer indoor or sheltered alternatives when rain or strong wind is expected',
    '- Schedule strenuous activities for the cooler morning and evening hours',
    '- Mention sunrise and sunset spots where they fit the plan',
  ].join('\n');
}

/**
 * Parse a comma- or space-separated list of temperatures ("29.5, 31")
 * @returns undefined when any entry is not a number
 */
export function parseTemperatureList(value: string): number[] | undefined {
  const parts = value.split(/[,\s]+/).filter(Boolean);
  if (parts.length === 0) {
    return undefined;
  }
  const temperatures = parts.map(Number);
  return temperatures.every(Number.isFinite) ? temperatures : undefined;
}

/**
 * Fit a temperature list to the trip length: extra entries are dropped,
 * missing ones repeat the last value
 */
export function fitTemperatures(temperatures: number[], days: number, fallback: number): number[] {
  const fitted: number[] = [];
  for (let i = 0; i < days; i++) {
    fitted.push(temperatures[i] ?? temperatures[temperatures.length - 1] ?? fallback);
  }
  return fitted;
}
