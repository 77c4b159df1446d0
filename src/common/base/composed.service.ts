import { BaseService } from "./base.service";
import { WithErrorHandling } from "./mixins/error-handling.mixin";
import { WithLifecycle } from "./mixins/lifecycle.mixin";

// Common combination: logging + lifecycle + error tracking
export abstract class StandardService extends WithErrorHandling(WithLifecycle(BaseService)) {}
