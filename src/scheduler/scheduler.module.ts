import { Module } from "@nestjs/common";
import { SourcesModule } from "@/sources/sources.module";
import { RefreshSchedulerService } from "./refresh-scheduler.service";

@Module({
  imports: [SourcesModule],
  providers: [RefreshSchedulerService],
  exports: [RefreshSchedulerService],
})
export class SchedulerModule {}
