import { ApiProperty } from "@nestjs/swagger";

export class ErrorDetailDto {
  @ApiProperty({ description: "Machine-readable error code", example: "SOURCE_NOT_FOUND" })
  code!: string;

  @ApiProperty({ description: "Error message", example: "Unknown source: traffic" })
  message!: string;

  @ApiProperty({ description: "Error timestamp", example: 1703123456789 })
  timestamp!: number;
}

export class HttpErrorResponseDto {
  @ApiProperty({ example: false })
  success!: boolean;

  @ApiProperty({ type: ErrorDetailDto })
  error!: ErrorDetailDto;

  @ApiProperty({ description: "Response timestamp", example: 1703123456789 })
  timestamp!: number;
}
