import { classifySourceError } from "@/common/utils/error-classification.utils";
import { SourceManager } from "./source-manager";

export interface SectionResult<S> {
  value: S;
  degraded: boolean;
  error?: string;
}

/**
 * Payloads assembled from independent sections carry the names of the sections
 * that fell back to their defaults.
 */
export interface CompositePayload {
  degradedSections: string[];
}

/**
 * Source whose payload is merged from several upstream calls. A failing section
 * yields its default and is listed as degraded; the whole result stays `success`.
 */
export abstract class CompositeSourceManager<T extends CompositePayload> extends SourceManager<T> {
  protected async fetchSection<S>(name: string, fetcher: () => Promise<S>, fallback: S): Promise<SectionResult<S>> {
    try {
      return { value: await fetcher(), degraded: false };
    } catch (error) {
      const reason = classifySourceError(error);
      if (!reason) {
        throw error;
      }

      this.logWarning(`Section "${name}" failed, using default: ${reason.describe()}`, this.key);
      return { value: fallback, degraded: true, error: reason.describe() };
    }
  }

  protected degradedSections(sections: Record<string, SectionResult<unknown>>): string[] {
    return Object.entries(sections)
      .filter(([, section]) => section.degraded)
      .map(([name]) => name);
  }
}
