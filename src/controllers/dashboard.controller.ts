import {
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  Logger,
  NotFoundException,
  Param,
  ParseBoolPipe,
  Post,
  Query,
} from "@nestjs/common";
import { ApiExtraModels, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { FetchResult, RefreshCycleReport, SourceCacheInfo } from "@/common/types/sources";
import { RefreshSchedulerService } from "@/scheduler/refresh-scheduler.service";
import { SourceRegistry } from "@/sources/base/source.registry";
import type { SourceManager } from "@/sources/base/source-manager";
import { HttpErrorResponseDto } from "./dto/common-error.dto";
import { FetchResultDto, RefreshCycleReportDto, SourceCacheInfoDto, SourceSummaryDto } from "./dto/source.dto";

export interface SourceSummary extends SourceCacheInfo {
  enabled: boolean;
}

/**
 * Read side for the rendering layer: one route per source plus cache maintenance
 */
@ApiTags("Sources")
@ApiExtraModels(HttpErrorResponseDto)
@Controller("sources")
export class DashboardController {
  private readonly logger = new Logger(DashboardController.name);

  constructor(
    private readonly registry: SourceRegistry,
    private readonly scheduler: RefreshSchedulerService
  ) {}

  @Get()
  @ApiOperation({ summary: "List registered sources with cache info" })
  @ApiResponse({ status: 200, type: [SourceSummaryDto] })
  listSources(): SourceSummary[] {
    return this.registry.getAll().map(source => ({ ...source.getCacheInfo(), enabled: source.isEnabled() }));
  }

  @Post("refresh")
  @HttpCode(200)
  @ApiOperation({ summary: "Run one refresh cycle over every source now" })
  @ApiResponse({ status: 200, type: RefreshCycleReportDto })
  async refreshAll(): Promise<RefreshCycleReport> {
    this.logger.log("Manual refresh cycle requested");
    return this.scheduler.runCycle();
  }

  @Get(":key")
  @ApiOperation({
    summary: "Get a source's current result",
    description: "Served from cache while fresh; refresh=true forces an upstream fetch",
  })
  @ApiParam({ name: "key", example: "bitcoin" })
  @ApiQuery({ name: "refresh", required: false, type: Boolean })
  @ApiResponse({ status: 200, type: FetchResultDto })
  @ApiResponse({ status: 404, description: "Unknown source", type: HttpErrorResponseDto })
  async getSourceData(
    @Param("key") key: string,
    @Query("refresh", new DefaultValuePipe(false), ParseBoolPipe) refresh: boolean
  ): Promise<FetchResult<unknown>> {
    return this.resolve(key).getData(refresh);
  }

  @Get(":key/cache")
  @ApiOperation({ summary: "Get a source's cache info" })
  @ApiResponse({ status: 200, type: SourceCacheInfoDto })
  @ApiResponse({ status: 404, description: "Unknown source", type: HttpErrorResponseDto })
  getCacheInfo(@Param("key") key: string): SourceCacheInfo {
    return this.resolve(key).getCacheInfo();
  }

  @Post(":key/cache/clear")
  @HttpCode(200)
  @ApiOperation({ summary: "Drop a source's cached result" })
  @ApiResponse({ status: 200, type: SourceCacheInfoDto })
  @ApiResponse({ status: 404, description: "Unknown source", type: HttpErrorResponseDto })
  clearCache(@Param("key") key: string): SourceCacheInfo {
    const source = this.resolve(key);
    source.clearCache();
    this.logger.log(`Cache cleared for ${key}`);
    return source.getCacheInfo();
  }

  private resolve(key: string): SourceManager<unknown> {
    const source = this.registry.get(key);
    if (!source) {
      throw new NotFoundException({ code: "SOURCE_NOT_FOUND", message: `Unknown source: ${key}` });
    }
    return source;
  }
}
