import { Module } from "@nestjs/common";
import { TimeBoxedCacheService } from "./time-boxed-cache.service";

@Module({
  providers: [TimeBoxedCacheService],
  exports: [TimeBoxedCacheService],
})
export class CacheModule {}
