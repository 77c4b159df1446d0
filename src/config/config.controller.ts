import { Controller, Get, NotFoundException, Param } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from "@nestjs/swagger";
import { ConfigService } from "./config.service";
import { ENV } from "./environment.constants";

const EXPOSED_SECTIONS = ["weather", "bitcoin", "google_calendar", "app"];

@ApiTags("Configuration")
@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get("status")
  @ApiOperation({ summary: "Get configuration status and validation warnings" })
  @ApiResponse({ status: 200, description: "Configuration status retrieved successfully" })
  getConfigurationStatus() {
    return {
      environment: {
        nodeEnv: ENV.APPLICATION.NODE_ENV,
        port: ENV.APPLICATION.PORT,
        logLevel: ENV.LOGGING.LOG_LEVEL,
      },
      status: this.configService.getConfigStatus(),
      warnings: this.configService.validateConfiguration(),
    };
  }

  @Get(":section")
  @ApiOperation({ summary: "Get one configuration section with credentials masked" })
  @ApiParam({ name: "section", enum: EXPOSED_SECTIONS })
  @ApiResponse({ status: 200, description: "Section retrieved successfully" })
  @ApiResponse({ status: 404, description: "Unknown section" })
  getSection(@Param("section") section: string) {
    if (!EXPOSED_SECTIONS.includes(section)) {
      throw new NotFoundException({ code: "CONFIG_SECTION_NOT_FOUND", message: `Unknown config section: ${section}` });
    }
    return this.configService.getMaskedSection(section);
  }
}
