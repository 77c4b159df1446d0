import type { SourceManager } from "./source-manager";

/**
 * Registered source managers in registration order. Each key is a reserved cache namespace.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, SourceManager<unknown>>();

  register(source: SourceManager<unknown>): void {
    if (this.sources.has(source.key)) {
      throw new Error(`Source '${source.key}' is already registered`);
    }
    this.sources.set(source.key, source);
  }

  get(key: string): SourceManager<unknown> | undefined {
    return this.sources.get(key);
  }

  has(key: string): boolean {
    return this.sources.has(key);
  }

  getAll(): SourceManager<unknown>[] {
    return [...this.sources.values()];
  }

  keys(): string[] {
    return [...this.sources.keys()];
  }
}
