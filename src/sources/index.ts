export * from "./base";
export * from "./bitcoin/bitcoin-source.service";
export * from "./bitcoin/bitcoin.types";
export * from "./calendar/calendar-source.service";
export * from "./calendar/calendar.types";
export * from "./weather/weather-source.service";
export * from "./weather/weather.types";
export * from "./sources.module";
