/**
 * Itinerary helpers: date parsing, temperature labels and the activity
 * catalogue used by the itinerary tool and the activity-suggestions tool.
 *
 * Dates are handled as UTC midnights so that a trip date never shifts
 * with the host's timezone.
 */

import { activityCatalogue } from './activities.js';

export type TimeOfDay = 'morning' | 'afternoon' | 'evening';

export const MIN_TRIP_DAYS = 1;
export const MAX_TRIP_DAYS = 14;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function utcMidnight(year: number, monthIndex: number, day: number): Date {
  return new Date(Date.UTC(year, monthIndex, day));
}

/**
 * Parse a trip start date. Accepts "today", `YYYY-MM-DD` and anything
 * `Date.parse` understands ("15 Jan 2025"). Unparsable input means today.
 */
export function parseStartDate(input: string, now: Date = new Date()): Date {
  const today = utcMidnight(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const trimmed = input.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'today') {
    return today;
  }

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    const date = utcMidnight(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
    // Reject rollovers such as 2025-02-31
    return isoDate(date) === trimmed ? date : today;
  }

  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) {
    return today;
  }
  return utcMidnight(parsed.getFullYear(), parsed.getMonth(), parsed.getDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

/** `YYYY-MM-DD` */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `DD Mon YYYY`, e.g. `05 Mar 2025` */
export function formatDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${day} ${MONTHS[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
}

/**
 * Clamp a requested trip length to 1..14 days
 */
export function validateDays(days: number): number {
  if (!Number.isFinite(days) || days < MIN_TRIP_DAYS) {
    return MIN_TRIP_DAYS;
  }
  return Math.min(Math.floor(days), MAX_TRIP_DAYS);
}

export function formatTemperature(temperature: number): string {
  let label: string;
  if (temperature < 20) {
    label = 'Cool';
  } else if (temperature < 25) {
    label = 'Pleasant';
  } else if (temperature < 30) {
    label = 'Warm';
  } else if (temperature < 35) {
    label = 'Hot';
  } else {
    label = 'Very Hot';
  }
  return `${temperature.toFixed(1)}°C (${label})`;
}

/**
 * Activities for a temperature, followed by activities for the time of day
 */
export function getActivitySuggestions(temperature: number, timeOfDay: TimeOfDay = 'afternoon'): string[] {
  let byTemperature: string[];
  if (temperature < 25) {
    byTemperature = activityCatalogue.mild;
  } else if (temperature < 30) {
    byTemperature = activityCatalogue.warm;
  } else {
    byTemperature = activityCatalogue.hot;
  }
  return [...byTemperature, ...activityCatalogue[timeOfDay]];
}
