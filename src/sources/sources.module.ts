import { Module } from "@nestjs/common";
import { CacheModule } from "@/cache/cache.module";
import { HttpJsonClient } from "@/common/http/http-json.client";
import { SourceRegistry } from "./base/source.registry";
import { BitcoinSourceService } from "./bitcoin/bitcoin-source.service";
import { CalendarSourceService } from "./calendar/calendar-source.service";
import { WeatherSourceService } from "./weather/weather-source.service";

@Module({
  imports: [CacheModule],
  providers: [
    HttpJsonClient,
    BitcoinSourceService,
    WeatherSourceService,
    CalendarSourceService,

    // Registration order is the scheduler's refresh order
    {
      provide: SourceRegistry,
      useFactory: (bitcoin: BitcoinSourceService, weather: WeatherSourceService, calendar: CalendarSourceService) => {
        const registry = new SourceRegistry();
        registry.register(bitcoin);
        registry.register(weather);
        registry.register(calendar);
        return registry;
      },
      inject: [BitcoinSourceService, WeatherSourceService, CalendarSourceService],
    },
  ],
  exports: [SourceRegistry, BitcoinSourceService, WeatherSourceService, CalendarSourceService],
})
export class SourcesModule {}
