import { WithLogging } from "./mixins/logging.mixin";
import type { IBaseService } from "../types/services/base.types";

// Create a simple base class
class SimpleBase {}

const LoggingBase = WithLogging(SimpleBase);

/**
 * Base service class that provides common logging functionality.
 * All logging methods are inherited from WithLogging mixin
 */
export abstract class BaseService extends LoggingBase implements IBaseService {}
