import fs from "node:fs";
import { google, type calendar_v3 } from "googleapis";
import { z } from "zod";
import type { EventSource } from "./calendar.js";
import { ConfigurationError } from "./errors.js";
import type { EventRecord, EventTime } from "./types.js";
import { errorMessage, logErr } from "./util.js";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar.readonly"];

const tokenFileSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().optional(),
});

type StoredTokens = z.infer<typeof tokenFileSchema>;

export type GoogleCalendarOptions = {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  tokenFile: string;
  calendarId?: string;
};

function toEventTime(t: calendar_v3.Schema$EventDateTime | undefined): EventTime | undefined {
  if (t?.dateTime) {
    const at = new Date(t.dateTime);
    return Number.isNaN(at.getTime()) ? undefined : { kind: "instant", at };
  }
  if (t?.date) return { kind: "date", date: t.date };
  return undefined;
}

/** Normalizes a Calendar API event; events without usable start/end are dropped. */
export function toEventRecord(e: calendar_v3.Schema$Event): EventRecord | undefined {
  const start = toEventTime(e.start);
  const end = toEventTime(e.end);
  if (!start || !end) return undefined;
  const record: EventRecord = { summary: e.summary || "No title", start, end };
  if (e.location) record.location = e.location;
  if (e.description) record.description = e.description;
  return record;
}

/**
 * Google Calendar listing over OAuth2. Consent happens elsewhere; this only
 * loads the stored token and keeps refreshed tokens on disk.
 */
export class GoogleCalendarSource implements EventSource {
  private readonly auth: InstanceType<typeof google.auth.OAuth2>;
  private readonly tokenFile: string;
  private readonly calendarId: string;
  private calendar: calendar_v3.Calendar | undefined;

  constructor(opts: GoogleCalendarOptions) {
    const missing = [
      opts.clientId ? undefined : "GOOGLE_CLIENT_ID",
      opts.clientSecret ? undefined : "GOOGLE_CLIENT_SECRET",
    ].filter((k): k is string => k !== undefined);
    if (missing.length > 0) {
      throw new ConfigurationError(`Google Calendar credentials are required: ${missing.join(", ")}`, missing);
    }
    this.auth = new google.auth.OAuth2(opts.clientId, opts.clientSecret, opts.redirectUri ?? "http://localhost");
    this.tokenFile = opts.tokenFile;
    this.calendarId = opts.calendarId ?? "primary";
    this.auth.on("tokens", (tokens) => {
      this.saveTokens({ ...this.readTokens(), ...tokens });
    });
  }

  private readTokens(): StoredTokens | undefined {
    if (!fs.existsSync(this.tokenFile)) return undefined;
    try {
      const parsed = tokenFileSchema.safeParse(JSON.parse(fs.readFileSync(this.tokenFile, "utf8")));
      if (parsed.success) return parsed.data;
      logErr("warn: ignoring malformed token file", this.tokenFile);
    } catch (e) {
      logErr("warn: reading token file failed:", errorMessage(e));
    }
    return undefined;
  }

  private saveTokens(tokens: StoredTokens) {
    try {
      fs.writeFileSync(this.tokenFile, JSON.stringify(tokens, null, 2), { encoding: "utf8", mode: 0o600 });
    } catch (e) {
      logErr("warn: saving refreshed token failed:", errorMessage(e));
    }
  }

  /** Consent URL for the read-only calendar scope; the redirect is handled outside this process. */
  authorizationUrl(): string {
    return this.auth.generateAuthUrl({ access_type: "offline", scope: CALENDAR_SCOPES });
  }

  isAuthenticated(): boolean {
    return this.calendar !== undefined;
  }

  async authenticate(): Promise<boolean> {
    if (this.calendar) return true;
    const tokens = this.readTokens();
    if (!tokens || (!tokens.refresh_token && !tokens.access_token)) {
      logErr("info: no stored Google token at", this.tokenFile);
      return false;
    }
    this.auth.setCredentials(tokens);
    await this.auth.getAccessToken();
    this.calendar = google.calendar({ version: "v3", auth: this.auth });
    logErr("info: Google Calendar client initialized");
    return true;
  }

  async listEvents(start: Date, end: Date, maxResults: number): Promise<EventRecord[]> {
    if (!this.calendar) throw new Error("calendar not authenticated");
    const res = await this.calendar.events.list({
      calendarId: this.calendarId,
      timeMin: start.toISOString(),
      timeMax: end.toISOString(),
      maxResults,
      singleEvents: true,
      orderBy: "startTime",
    });
    return (res.data.items ?? [])
      .map(toEventRecord)
      .filter((e): e is EventRecord => e !== undefined);
  }
}
