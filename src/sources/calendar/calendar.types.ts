export interface CalendarEvent {
  title: string;
  description: string;
  /** "HH:MM" in the event's own offset, or "All day" */
  time: string;
  /** "DD/MM" */
  date: string;
  /** Start as sent by the API: an RFC 3339 date-time, or a date for all-day events */
  start: string;
  isAllDay: boolean;
  location: string;
  url: string;
}

export interface CalendarData {
  events: CalendarEvent[];
  totalEvents: number;
}
