import type { TimeWindow } from './types';

const MINUTE_MS = 60_000;

/** ISO-8601 UTC at second precision, e.g. `2023-11-14T22:13:20Z` */
export function formatUtc(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/** `[center - before, center + after]`, minutes */
export function windowAround(center: Date, beforeMinutes: number, afterMinutes: number): TimeWindow {
  return Object.freeze({
    start: new Date(center.getTime() - beforeMinutes * MINUTE_MS),
    end: new Date(center.getTime() + afterMinutes * MINUTE_MS),
  });
}

/** Same end, start moved back by `extraMinutes` */
export function widenWindow(window: TimeWindow, extraMinutes: number): TimeWindow {
  return Object.freeze({
    start: new Date(window.start.getTime() - extraMinutes * MINUTE_MS),
    end: window.end,
  });
}
