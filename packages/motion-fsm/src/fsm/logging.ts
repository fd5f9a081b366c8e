/**
 * Log line formatting and the default console sink
 */

import type { LogCallback } from './types.js';

export const LOG_TAG = '[FSM]';

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * `[HH:MM:SS.mmm] message`, local time
 */
export function formatLogLine(message: string, date: Date): string {
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `[${time}.${pad(date.getMilliseconds(), 3)}] ${message}`;
}

export const consoleLogSink: LogCallback = (line) => {
  console.log(`${LOG_TAG} ${line}`);
};
