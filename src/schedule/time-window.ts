import type { ClassSchedule, ScheduleMap, TimeOfDay } from '../types/index.js';

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parse `HH:MM:SS` or `HH:MM` into seconds since midnight.
 * Returns null for anything else (an invalid time counts as absent).
 */
export function parseTimeOfDay(raw: unknown): TimeOfDay | null {
  if (typeof raw !== 'string') return null;
  const match = raw.trim().match(TIME_PATTERN);
  if (!match) return null;

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = match[3] ? parseInt(match[3], 10) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return hours * 3600 + minutes * 60 + seconds;
}

export function secondsOfDay(date: Date): TimeOfDay {
  return date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds();
}

export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${pad(Math.floor(time / 3600))}:${pad(Math.floor((time % 3600) / 60))}:${pad(time % 60)}`;
}

/**
 * Active window: no start → always; start only → from start on;
 * both → [start, end). Windows do not wrap past midnight.
 */
export function isWithinClassWindow(schedule: ClassSchedule, now: Date): boolean {
  if (schedule.startTime === null) return true;
  const current = secondsOfDay(now);
  if (schedule.endTime === null) return current >= schedule.startTime;
  return current >= schedule.startTime && current < schedule.endTime;
}

/** A class with no end time never ends on its own. */
export function hasClassEnded(schedule: ClassSchedule, now: Date): boolean {
  if (schedule.endTime === null) return false;
  return secondsOfDay(now) >= schedule.endTime;
}

/** The class's end on the same day as `now`, or null when it has no end time. */
export function classEndDate(schedule: ClassSchedule, now: Date): Date | null {
  if (schedule.endTime === null) return null;
  const end = new Date(now);
  end.setHours(0, 0, 0, 0);
  end.setSeconds(schedule.endTime);
  return end;
}

export function activeClasses(schedules: ScheduleMap, now: Date): ClassSchedule[] {
  return [...schedules.values()].filter(s => isWithinClassWindow(s, now));
}

/** The nearest class starting later today, with milliseconds until its start. */
export function nextUpcomingClass(
  schedules: ScheduleMap,
  now: Date,
): { schedule: ClassSchedule; startsInMs: number } | null {
  const current = secondsOfDay(now);
  let best: ClassSchedule | null = null;

  for (const schedule of schedules.values()) {
    if (schedule.startTime === null || schedule.startTime <= current) continue;
    if (best === null || best.startTime === null || schedule.startTime < best.startTime) {
      best = schedule;
    }
  }

  if (best === null || best.startTime === null) return null;
  const startsInMs = (best.startTime - current) * 1000 - now.getMilliseconds();
  return { schedule: best, startsInMs };
}
