import { Global, Module } from "@nestjs/common";
import { ConfigService } from "./config.service";
import { ConfigController } from "./config.controller";

@Global()
@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: () => new ConfigService(),
    },
  ],
  controllers: [ConfigController],
  exports: [ConfigService],
})
export class ConfigModule {}
