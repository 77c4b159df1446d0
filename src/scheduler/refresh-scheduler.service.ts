import { Inject, Injectable, Optional } from "@nestjs/common";
import { StandardService } from "@/common/base/composed.service";
import type {
  RefreshCycleReport,
  SchedulerState,
  SourceRefreshReport,
} from "@/common/types/sources";
import { sleep, waitWithTimeout } from "@/common/utils/async.utils";
import { DEFAULT_API_UPDATE_INTERVAL_S } from "@/config/config.defaults";
import { ConfigService } from "@/config/config.service";
import { ENV } from "@/config/environment.constants";
import { SourceRegistry } from "@/sources/base/source.registry";
import type { SourceManager } from "@/sources/base/source-manager";

export interface RefreshSchedulerSettings {
  /** Start the loop on module init */
  enabled: boolean;
  /** How often the loop wakes to check whether a cycle is due */
  checkIntervalMs: number;
  /** Pause after an iteration fails outside any source call */
  errorBackoffMs: number;
  /** Default bound for stop() */
  shutdownTimeoutMs: number;
}

const FAILED_REFRESH_THRESHOLD = 3;

export const REFRESH_SCHEDULER_SETTINGS = "REFRESH_SCHEDULER_SETTINGS";

/**
 * Keeps every registered source warm from one cooperative async loop.
 *
 * Each wake-up runs a cycle when `app.api_update_interval` has elapsed since the last one,
 * then sleeps. A cycle refreshes the sources one after another, each inside its own
 * failure boundary.
 */
@Injectable()
export class RefreshSchedulerService extends StandardService {
  private readonly settings: RefreshSchedulerSettings;
  private state: SchedulerState = "stopped";
  private loop?: Promise<void>;
  private loopActive = false;
  private sleepController?: AbortController;
  private lastCycleAt: number | null = null;
  private lastCycle: RefreshCycleReport | null = null;

  constructor(
    private readonly registry: SourceRegistry,
    private readonly config: ConfigService,
    @Optional() @Inject(REFRESH_SCHEDULER_SETTINGS) settings?: Partial<RefreshSchedulerSettings>
  ) {
    super();
    this.settings = {
      enabled: ENV.SCHEDULER.ENABLED,
      checkIntervalMs: ENV.SCHEDULER.CHECK_INTERVAL_MS,
      errorBackoffMs: ENV.SCHEDULER.ERROR_BACKOFF_MS,
      shutdownTimeoutMs: ENV.SCHEDULER.SHUTDOWN_TIMEOUT_MS,
      ...settings,
    };
  }

  async initialize(): Promise<void> {
    if (this.settings.enabled) {
      this.start();
    } else {
      this.logger.log("Background refresh disabled");
    }
  }

  async cleanup(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.state === "running") {
      this.logWarning("Background refresh already running");
      return;
    }

    this.state = "running";
    // A loop still winding down from stop() sees the flag and carries on
    if (!this.loopActive) {
      this.loop = this.runLoop();
    }
  }

  /**
   * Ask the loop to exit and wait for it at most `timeoutMs`. Returns whether it exited;
   * shutdown proceeds either way.
   */
  async stop(timeoutMs = this.settings.shutdownTimeoutMs): Promise<boolean> {
    this.state = "stopped";
    this.sleepController?.abort();

    const loop = this.loop;
    if (!loop) {
      return true;
    }

    const exited = await waitWithTimeout(loop, timeoutMs);
    if (exited) {
      this.loop = undefined;
    } else {
      this.logWarning(`Refresh loop did not exit within ${timeoutMs}ms, proceeding`);
    }
    return exited;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  getState(): SchedulerState {
    return this.state;
  }

  getLastCycle(): RefreshCycleReport | null {
    return this.lastCycle;
  }

  getLastCycleAt(): number | null {
    return this.lastCycleAt;
  }

  /**
   * Refresh every registered source once, in registration order
   */
  async runCycle(): Promise<RefreshCycleReport> {
    const startedAt = Date.now();

    const results: SourceRefreshReport[] = [];
    for (const source of this.registry.getAll()) {
      results.push(await this.refreshSource(source));
    }

    const report: RefreshCycleReport = { startedAt, durationMs: Date.now() - startedAt, results };
    this.lastCycle = report;
    this.lastCycleAt = startedAt;

    const summary = results.map(result => `${result.key}=${result.status}`).join(", ");
    this.logger.log(`Refresh cycle completed in ${report.durationMs}ms: ${summary}`);
    return report;
  }

  private async runLoop(): Promise<void> {
    this.loopActive = true;
    this.logger.log(`Background refresh started (check every ${this.settings.checkIntervalMs}ms)`);

    try {
      while (this.state === "running") {
        let delay = this.settings.checkIntervalMs;
        try {
          if (this.isCycleDue()) {
            await this.runCycle();
          }
        } catch (error) {
          this.handleError(error instanceof Error ? error : new Error(String(error)), "refresh loop", {
            shouldThrow: false,
          });
          delay = this.settings.errorBackoffMs;
        }

        if (this.state !== "running") {
          break;
        }
        await this.pause(delay);
      }
    } finally {
      this.loopActive = false;
      this.logger.log("Background refresh stopped");
    }
  }

  private isCycleDue(): boolean {
    if (this.lastCycleAt === null) {
      return true;
    }
    // Re-read so runtime changes to the interval apply on the next wake-up
    const intervalMs = this.config.getNumber("app.api_update_interval", DEFAULT_API_UPDATE_INTERVAL_S) * 1000;
    return Date.now() - this.lastCycleAt > intervalMs;
  }

  private async pause(ms: number): Promise<void> {
    const controller = new AbortController();
    this.sleepController = controller;
    try {
      await sleep(ms, controller.signal);
    } finally {
      this.sleepController = undefined;
    }
  }

  private async refreshSource(source: SourceManager<unknown>): Promise<SourceRefreshReport> {
    const started = Date.now();

    if (!source.isEnabled()) {
      return { key: source.key, status: "skipped", durationMs: 0 };
    }

    try {
      const result = await source.getData(true);
      const durationMs = Date.now() - started;
      this.resetErrorTracking(`refresh ${source.key}`);

      if (result.status === "cached" || result.status === "error") {
        return { key: source.key, status: result.status, durationMs, error: result.error };
      }
      return { key: source.key, status: result.status, durationMs };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.handleError(failure, `refresh ${source.key}`, {
        shouldThrow: false,
        threshold: FAILED_REFRESH_THRESHOLD,
        additionalData: { source: source.key },
      });
      return { key: source.key, status: "failed", durationMs: Date.now() - started, error: failure.message };
    }
  }
}
