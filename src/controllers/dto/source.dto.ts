import { ApiProperty } from "@nestjs/swagger";

const FETCH_STATUSES = ["success", "mock", "cached", "error"];

export class SourceCacheInfoDto {
  @ApiProperty({ description: "Source key, also its cache namespace", example: "bitcoin" })
  key!: string;

  @ApiProperty({ description: "Whether the cache holds this source's last result", example: true })
  cached!: boolean;

  @ApiProperty({ description: "Age of the cached result in ms", example: 42000, nullable: true, type: Number })
  ageMs!: number | null;

  @ApiProperty({ description: "Older than the refresh interval, or absent", example: false })
  isExpired!: boolean;

  @ApiProperty({ description: "Current refresh interval in ms", example: 300000 })
  refreshIntervalMs!: number;

  @ApiProperty({
    description: "Category-prefixed message of the last failed refresh",
    example: "network: Failed to fetch mempool: HTTP 503: Service Unavailable",
    nullable: true,
    type: String,
  })
  lastError!: string | null;

  @ApiProperty({ enum: [...FETCH_STATUSES, "unknown"], example: "success" })
  status!: string;
}

export class SourceSummaryDto extends SourceCacheInfoDto {
  @ApiProperty({ description: "Whether the scheduler refreshes this source", example: true })
  enabled!: boolean;
}

export class FetchResultDto {
  @ApiProperty({ enum: FETCH_STATUSES, example: "success" })
  status!: string;

  @ApiProperty({ description: "Source payload; absent for error results", required: false })
  data?: unknown;

  @ApiProperty({ description: "Epoch ms of the fetch that produced the data", example: 1703123456789 })
  lastUpdated!: number;

  @ApiProperty({ example: "weather" })
  source!: string;

  @ApiProperty({ description: "Present on cached and error results", required: false, example: "network: timeout" })
  error?: string;
}

export class SourceRefreshReportDto {
  @ApiProperty({ example: "bitcoin" })
  key!: string;

  @ApiProperty({ enum: [...FETCH_STATUSES, "failed", "skipped"], example: "success" })
  status!: string;

  @ApiProperty({ example: 412 })
  durationMs!: number;

  @ApiProperty({ required: false })
  error?: string;
}

export class RefreshCycleReportDto {
  @ApiProperty({ example: 1703123456789 })
  startedAt!: number;

  @ApiProperty({ example: 1210 })
  durationMs!: number;

  @ApiProperty({ type: [SourceRefreshReportDto] })
  results!: SourceRefreshReportDto[];
}
