import { Module } from "@nestjs/common";
import { CacheModule } from "@/cache/cache.module";
import { ConfigModule } from "@/config/config.module";
import { DashboardController } from "@/controllers/dashboard.controller";
import { HealthController } from "@/controllers/health.controller";
import { SchedulerModule } from "@/scheduler/scheduler.module";
import { SourcesModule } from "@/sources/sources.module";

@Module({
  imports: [ConfigModule, CacheModule, SourcesModule, SchedulerModule],
  controllers: [DashboardController, HealthController],
})
export class AppModule {}
