import type { Logger } from "@nestjs/common";
import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";

/**
 * Minimal public surface every service exposes
 */
export interface IBaseService extends LoggingCapabilities {
  readonly logger: Logger;
}
