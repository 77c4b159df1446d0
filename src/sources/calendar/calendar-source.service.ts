import { Injectable } from "@nestjs/common";
import { TimeBoxedCacheService } from "@/cache/time-boxed-cache.service";
import { MalformedResponseError, NotConfiguredError } from "@/common/errors";
import { HttpJsonClient } from "@/common/http/http-json.client";
import { expectRecord, readOptionalString, readRecord, type JsonRecord } from "@/common/utils/payload.utils";
import { ConfigService } from "@/config/config.service";
import { SourceManager } from "../base/source-manager";
import { refreshIntervalFrom, resolveEndpoints } from "../source-config.utils";
import {
  CALENDAR_ENDPOINTS,
  CALENDAR_SOURCE_KEY,
  DEFAULT_CALENDAR_MAX_RESULTS,
  MAX_DESCRIPTION_LENGTH,
  MAX_TITLE_LENGTH,
} from "./calendar.constants";
import type { CalendarData, CalendarEvent } from "./calendar.types";

const START_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}))?/;

interface StartParts {
  day: string;
  date: string;
  time?: string;
}

// Read the wall-clock fields as written so the event keeps its own offset
function parseStart(start: string): StartParts | undefined {
  const match = START_PATTERN.exec(start);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hours, minutes] = match;
  return {
    day: `${year}-${month}-${day}`,
    date: `${day}/${month}`,
    time: hours !== undefined && minutes !== undefined ? `${hours}:${minutes}` : undefined,
  };
}

function localDay(epochMs: number): string {
  const now = new Date(epochMs);
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/**
 * Display form of one Google Calendar event. Throws MalformedResponseError when the
 * event has no usable start.
 */
export function formatCalendarEvent(event: JsonRecord): CalendarEvent {
  const start = readRecord(event, "start", "event");
  const raw = readOptionalString(start, "dateTime") || readOptionalString(start, "date");
  const parts = parseStart(raw);
  if (!parts) {
    throw new MalformedResponseError(`event: unrecognised start "${raw}"`);
  }

  return {
    title: readOptionalString(event, "summary", "No title").slice(0, MAX_TITLE_LENGTH),
    description: readOptionalString(event, "description").slice(0, MAX_DESCRIPTION_LENGTH),
    time: parts.time ?? "All day",
    date: parts.date,
    start: raw,
    isAllDay: parts.time === undefined,
    location: readOptionalString(event, "location"),
    url: readOptionalString(event, "htmlLink"),
  };
}

/**
 * Upcoming events from the Google Calendar REST API, authorised with an
 * already-issued OAuth access token.
 */
@Injectable()
export class CalendarSourceService extends SourceManager<CalendarData> {
  constructor(
    cache: TimeBoxedCacheService,
    private readonly http: HttpJsonClient,
    private readonly config: ConfigService
  ) {
    super(cache, {
      key: CALENDAR_SOURCE_KEY,
      refreshIntervalMs: refreshIntervalFrom(config, "google_calendar"),
      endpoints: resolveEndpoints(config, "google_calendar", CALENDAR_ENDPOINTS),
    });
  }

  isConfigured(): boolean {
    return this.config.hasCalendarAccessToken();
  }

  override isEnabled(): boolean {
    return this.isConfigured();
  }

  protected async fetchData(): Promise<CalendarData> {
    if (!this.isConfigured()) {
      throw new NotConfiguredError("Google Calendar access token not configured");
    }

    const calendarId = this.config.getString("google_calendar.calendar_id", "primary");
    const body = expectRecord(
      await this.http.getJson(`${this.endpoint("api")}/calendars/${encodeURIComponent(calendarId)}/events`, {
        params: {
          timeMin: new Date(Date.now()).toISOString(),
          maxResults: this.config.getNumber("google_calendar.max_results", DEFAULT_CALENDAR_MAX_RESULTS),
          singleEvents: true,
          orderBy: "startTime",
        },
        headers: { Authorization: `Bearer ${this.config.getString("google_calendar.access_token").trim()}` },
        context: "Failed to fetch calendar events",
      }),
      "calendar"
    );

    const items = Array.isArray(body.items) ? body.items : [];
    const events: CalendarEvent[] = [];

    items.forEach((item, index) => {
      try {
        events.push(formatCalendarEvent(expectRecord(item, `items[${index}]`)));
      } catch (error) {
        if (!(error instanceof MalformedResponseError)) {
          throw error;
        }
        this.logWarning(`Skipping calendar event: ${error.message}`);
      }
    });

    return { events, totalEvents: events.length };
  }

  async getUpcomingEvents(maxResults = 3): Promise<CalendarEvent[]> {
    if (!this.isConfigured()) {
      return [];
    }
    const result = await this.getData();
    return result.status === "error" ? [] : result.data.events.slice(0, maxResults);
  }

  async getTodayEvents(): Promise<CalendarEvent[]> {
    const today = localDay(Date.now());
    const events = await this.getUpcomingEvents(DEFAULT_CALENDAR_MAX_RESULTS);
    return events.filter(event => parseStart(event.start)?.day === today);
  }

  async getStatus(): Promise<string> {
    if (!this.isConfigured()) {
      return "unavailable";
    }
    const result = await this.getData();
    return result.status;
  }
}
