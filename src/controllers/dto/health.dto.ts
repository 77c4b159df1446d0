import { ApiProperty } from "@nestjs/swagger";

export class SchedulerHealthDto {
  @ApiProperty({ enum: ["running", "stopped"], example: "running" })
  state!: string;

  @ApiProperty({ description: "Start of the last completed refresh cycle", nullable: true, type: Number })
  lastCycleAt!: number | null;
}

export class HealthResponseDto {
  @ApiProperty({
    description: "degraded when any source has nothing to show",
    enum: ["healthy", "degraded"],
    example: "healthy",
  })
  status!: string;

  @ApiProperty({ description: "Health check timestamp", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Process uptime in seconds", example: 3600 })
  uptime!: number;

  @ApiProperty({ type: SchedulerHealthDto })
  scheduler!: SchedulerHealthDto;

  @ApiProperty({
    description: "Status dot per source",
    additionalProperties: { type: "string", enum: ["success", "cached", "error", "mock", "unknown"] },
    example: { bitcoin: "success", weather: "mock", calendar_events: "error" },
  })
  sources!: Record<string, string>;
}
