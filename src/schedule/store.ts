/**
 * JSON-file schedule store.
 *
 * File shape: `{ "<class name>": { "start_time": "09:00:00", "end_time": "10:15:00", ... } }`.
 * Every field other than the two times is kept as opaque connection parameters.
 */

import { readFileSync } from 'node:fs';
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import { parseTimeOfDay } from './time-window.js';
import type { ClassSchedule, ScheduleMap, ScheduleStore } from '../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse the schedule file's JSON text. Throws ConfigError when malformed. */
export function parseSchedules(raw: string, source = 'schedule'): ScheduleMap {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${source}: invalid JSON`, { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`${source}: expected an object keyed by class name`);
  }

  const schedules = new Map<string, ClassSchedule>();
  for (const [name, entry] of Object.entries(parsed)) {
    if (name.startsWith('_')) continue;
    if (!isRecord(entry)) {
      throw new ConfigError(`${source}: class "${name}" must be an object`);
    }

    const { start_time: rawStart, end_time: rawEnd, ...connection } = entry;
    const startTime = parseTimeOfDay(rawStart);
    const endTime = parseTimeOfDay(rawEnd);

    if (rawStart !== undefined && rawStart !== '' && startTime === null) {
      logger.warn(`ScheduleStore: "${name}" has unparsable start_time ${JSON.stringify(rawStart)} — treating as always active`);
    }
    if (rawEnd !== undefined && rawEnd !== '' && endTime === null) {
      logger.warn(`ScheduleStore: "${name}" has unparsable end_time ${JSON.stringify(rawEnd)} — class will not auto-end`);
    }

    schedules.set(name, Object.freeze({
      name,
      connection: Object.freeze(connection),
      startTime,
      endTime,
    }));
  }

  return schedules;
}

export class JsonScheduleStore implements ScheduleStore {
  constructor(private readonly path: string) {}

  loadSchedules(): ScheduleMap {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch (err) {
      throw new ConfigError(`Schedule file not found or unreadable: ${this.path}`, { cause: err });
    }

    const schedules = parseSchedules(raw, this.path);
    logger.info(`ScheduleStore: loaded ${schedules.size} class(es) from ${this.path}`);
    return schedules;
  }
}
