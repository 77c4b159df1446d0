import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { FetchStatus } from "@/common/types/sources";
import { RefreshSchedulerService } from "@/scheduler/refresh-scheduler.service";
import { SourceRegistry } from "@/sources/base/source.registry";
import { HealthResponseDto } from "./dto/health.dto";

export interface HealthResponse {
  status: "healthy" | "degraded";
  timestamp: number;
  uptime: number;
  scheduler: {
    state: string;
    lastCycleAt: number | null;
  };
  sources: Record<string, FetchStatus | "unknown">;
}

@ApiTags("System Health")
@Controller("health")
export class HealthController {
  constructor(
    private readonly registry: SourceRegistry,
    private readonly scheduler: RefreshSchedulerService
  ) {}

  @Get()
  @ApiOperation({
    summary: "Service health",
    description: "Scheduler state and a status dot per source, read from cache info without fetching",
  })
  @ApiResponse({ status: 200, type: HealthResponseDto })
  getHealth(): HealthResponse {
    const sources: HealthResponse["sources"] = {};
    for (const source of this.registry.getAll()) {
      sources[source.key] = source.getCacheInfo().status;
    }

    return {
      status: Object.values(sources).includes("error") ? "degraded" : "healthy",
      timestamp: Date.now(),
      uptime: Math.floor(process.uptime()),
      scheduler: {
        state: this.scheduler.getState(),
        lastCycleAt: this.scheduler.getLastCycleAt(),
      },
      sources,
    };
  }
}
