import { BackendError } from "./errors.js";
import { err, ok, unwrapOr, type Result } from "./result.js";
import type { EventRecord, EventTime } from "./types.js";
import { errorMessage, logErr, truncate } from "./util.js";

const DAY_MS = 864e5;

export const NO_EVENTS = "No events found for the specified time period.";
export const CALENDAR_BACKEND = "calendar";
export const CALENDAR_AUTH_BACKEND = "calendar-auth";

export type TimeWindow = {
  start: Date;
  end: Date;
  maxResults: number;
  /** Human phrase used in replies, e.g. "today". */
  label: string;
};

/**
 * Raw calendar listing capability. Implementations throw on failure; the
 * gateway turns that into a fail-open result.
 */
export interface EventSource {
  isAuthenticated(): boolean;
  authenticate(): Promise<boolean>;
  listEvents(start: Date, end: Date, maxResults: number): Promise<EventRecord[]>;
}

function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export function todayWindow(now: Date): TimeWindow {
  const start = startOfUtcDay(now);
  return { start, end: new Date(start.getTime() + DAY_MS), maxResults: 10, label: "today" };
}

export function tomorrowWindow(now: Date): TimeWindow {
  const start = new Date(startOfUtcDay(now).getTime() + DAY_MS);
  return { start, end: new Date(start.getTime() + DAY_MS), maxResults: 10, label: "tomorrow" };
}

export function thisWeekWindow(now: Date): TimeWindow {
  return { start: new Date(now.getTime()), end: new Date(now.getTime() + 7 * DAY_MS), maxResults: 50, label: "this week" };
}

/** Picks the window a calendar question is about; defaults to the coming week. */
export function windowFor(message: string, now: Date): TimeWindow {
  const lower = message.toLowerCase();
  if (lower.includes("today")) return todayWindow(now);
  if (lower.includes("tomorrow")) return tomorrowWindow(now);
  if (lower.includes("week")) return thisWeekWindow(now);
  return { ...thisWeekWindow(now), label: "the next 7 days" };
}

export function eventTimeMillis(t: EventTime): number {
  return t.kind === "instant" ? t.at.getTime() : Date.parse(`${t.date}T00:00:00Z`);
}

function parts(d: Date, timeZone: string, options: Intl.DateTimeFormatOptions): Map<string, string> {
  const fmt = new Intl.DateTimeFormat("en-US", { ...options, timeZone });
  return new Map(fmt.formatToParts(d).map((p) => [p.type, p.value]));
}

function dateLabel(d: Date, timeZone: string): string {
  const p = parts(d, timeZone, { weekday: "long", month: "long", day: "numeric", year: "numeric" });
  return `${p.get("weekday")}, ${p.get("month")} ${p.get("day")}, ${p.get("year")}`;
}

function timeLabel(d: Date, timeZone: string): string {
  const p = parts(d, timeZone, { hour: "2-digit", minute: "2-digit", hour12: true });
  return `${p.get("hour")}:${p.get("minute")} ${p.get("dayPeriod")}`;
}

export function formatEvent(event: EventRecord, timeZone = "UTC"): string {
  let date: string;
  let time: string;
  if (event.start.kind === "instant" && event.end.kind === "instant") {
    date = dateLabel(event.start.at, timeZone);
    time = `${timeLabel(event.start.at, timeZone)} - ${timeLabel(event.end.at, timeZone)}`;
  } else {
    // date-only markers are calendar days, not instants
    date = dateLabel(new Date(eventTimeMillis(event.start)), "UTC");
    time = "All day";
  }

  const lines = [`📅 ${event.summary || "No title"}`, `   Date: ${date}`, `   Time: ${time}`];
  if (event.location) lines.push(`   Location: ${event.location}`);
  if (event.description) lines.push(`   Description: ${truncate(event.description, 100)}`);
  return lines.join("\n");
}

export function formatEvents(events: readonly EventRecord[], timeZone = "UTC"): string {
  if (events.length === 0) return NO_EVENTS;
  const body = events.map((e, i) => `${i + 1}. ${formatEvent(e, timeZone)}`).join("\n\n");
  return `Found ${events.length} event(s):\n\n${body}`;
}

export type CalendarGatewayOptions = {
  timeZone?: string;
  now?: () => Date;
};

export class CalendarGateway {
  readonly timeZone: string;
  private readonly source: EventSource;
  private readonly now: () => Date;

  constructor(source: EventSource, opts: CalendarGatewayOptions = {}) {
    this.source = source;
    this.timeZone = opts.timeZone ?? "UTC";
    this.now = opts.now ?? (() => new Date());
  }

  /** Safe to call repeatedly; returns true without side effects once authenticated. */
  async authenticate(): Promise<boolean> {
    if (this.source.isAuthenticated()) return true;
    try {
      return await this.source.authenticate();
    } catch (e) {
      logErr("warn: calendar authentication failed:", errorMessage(e));
      return false;
    }
  }

  /** Like eventsIn, but says whether the listing failed. */
  async fetch(window: TimeWindow): Promise<Result<EventRecord[], BackendError>> {
    if (!(await this.authenticate())) {
      return err(new BackendError(CALENDAR_AUTH_BACKEND, "not authenticated"));
    }
    try {
      const events = await this.source.listEvents(window.start, window.end, window.maxResults);
      const valid = events.filter((e) => eventTimeMillis(e.start) < eventTimeMillis(e.end));
      logErr("info: retrieved", String(valid.length), "calendar events");
      return ok(valid.slice(0, window.maxResults));
    } catch (e) {
      logErr("warn: calendar listing failed:", errorMessage(e));
      return err(BackendError.from(CALENDAR_BACKEND, e));
    }
  }

  async eventsIn(start: Date, end: Date, maxResults = 10): Promise<EventRecord[]> {
    return unwrapOr(await this.fetch({ start, end, maxResults, label: "" }), []);
  }

  today(): Promise<EventRecord[]> {
    const w = todayWindow(this.now());
    return this.eventsIn(w.start, w.end, w.maxResults);
  }

  thisWeek(): Promise<EventRecord[]> {
    const w = thisWeekWindow(this.now());
    return this.eventsIn(w.start, w.end, w.maxResults);
  }

  format(event: EventRecord): string {
    return formatEvent(event, this.timeZone);
  }

  formatList(events: readonly EventRecord[]): string {
    return formatEvents(events, this.timeZone);
  }
}
