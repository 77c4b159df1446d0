import type { AbstractConstructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Error handling capabilities
 */
export interface ErrorHandlingCapabilities {
  handleError(
    error: Error,
    context: string,
    options?: {
      shouldThrow?: boolean;
      shouldLog?: boolean;
      threshold?: number;
      additionalData?: Record<string, unknown>;
    }
  ): void;
  getErrorCount(context: string): number;
  getLastHandledError(context: string): { error: Error; timestamp: number } | undefined;
  resetErrorTracking(context?: string): void;
}

/**
 * Mixin that adds per-context error tracking to a service
 */
export function WithErrorHandling<TBase extends AbstractConstructor<LoggingCapabilities>>(Base: TBase) {
  abstract class ErrorHandlingMixin extends Base implements ErrorHandlingCapabilities {
    public errorCounts = new Map<string, number>();
    public lastErrors = new Map<string, { error: Error; timestamp: number }>();

    handleError(
      error: Error,
      context: string,
      options: {
        shouldThrow?: boolean;
        shouldLog?: boolean;
        threshold?: number;
        additionalData?: Record<string, unknown>;
      } = {}
    ): void {
      const { shouldThrow = true, shouldLog = true, threshold, additionalData } = options;

      const count = (this.errorCounts.get(context) || 0) + 1;
      this.errorCounts.set(context, count);
      this.lastErrors.set(context, { error, timestamp: Date.now() });

      if (shouldLog) {
        this.logError(error, context, additionalData);
      }

      if (threshold && count >= threshold) {
        this.logger.error(`Error threshold exceeded for ${context}: ${threshold} errors`);
      }

      if (shouldThrow) {
        throw error;
      }
    }

    getErrorCount(context: string): number {
      return this.errorCounts.get(context) || 0;
    }

    getLastHandledError(context: string): { error: Error; timestamp: number } | undefined {
      return this.lastErrors.get(context);
    }

    resetErrorTracking(context?: string): void {
      if (context) {
        this.errorCounts.delete(context);
        this.lastErrors.delete(context);
      } else {
        this.errorCounts.clear();
        this.lastErrors.clear();
      }
    }
  }

  return ErrorHandlingMixin;
}
