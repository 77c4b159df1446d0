export const CALENDAR_SOURCE_KEY = "calendar_events";

export const CALENDAR_ENDPOINTS = Object.freeze({
  api: "https://www.googleapis.com/calendar/v3",
});

export const DEFAULT_CALENDAR_MAX_RESULTS = 10;
export const MAX_TITLE_LENGTH = 50;
export const MAX_DESCRIPTION_LENGTH = 100;
