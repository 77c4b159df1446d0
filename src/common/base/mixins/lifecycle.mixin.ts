import type { OnModuleInit, OnModuleDestroy } from "@nestjs/common";
import type { AbstractConstructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Lifecycle management capabilities
 */
export interface LifecycleCapabilities {
  isServiceInitialized(): boolean;
  isServiceDestroyed(): boolean;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}

/**
 * Mixin that adds Nest lifecycle hooks with single-flight init and cleanup
 */
export function WithLifecycle<TBase extends AbstractConstructor<LoggingCapabilities>>(Base: TBase) {
  abstract class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    public isInitialized = false;
    public isDestroyed = false;
    public initializationPromise?: Promise<void>;
    public cleanupPromise?: Promise<void>;

    async onModuleInit(): Promise<void> {
      if (!this.initializationPromise) {
        this.initializationPromise = this.performInitialization();
      }
      return this.initializationPromise;
    }

    async onModuleDestroy(): Promise<void> {
      if (!this.cleanupPromise) {
        this.cleanupPromise = this.performCleanup();
      }
      return this.cleanupPromise;
    }

    isServiceInitialized(): boolean {
      return this.isInitialized;
    }

    isServiceDestroyed(): boolean {
      return this.isDestroyed;
    }

    initialize?(): Promise<void>;
    cleanup?(): Promise<void>;

    public async performInitialization(): Promise<void> {
      try {
        await this.initialize?.();
        this.isInitialized = true;
        this.logInitialization();
      } catch (error) {
        this.logError(error instanceof Error ? error : new Error(String(error)), "Service initialization failed");
        throw error;
      }
    }

    public async performCleanup(): Promise<void> {
      try {
        this.logShutdown();
        await this.cleanup?.();
        this.isDestroyed = true;
      } catch (error) {
        this.logError(error instanceof Error ? error : new Error(String(error)), "Service cleanup failed");
        throw error;
      }
    }
  }

  return LifecycleMixin;
}
