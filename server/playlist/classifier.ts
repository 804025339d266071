import type { Logger } from '../obs/logger';
import { TimeoutError, withDeadline } from '../utils/async';
import { errorMessage } from './errors';
import { normalizeForMatch, type CompiledRegion } from './taxonomy';
import type { ClassificationResult, PassStats } from './types';

/**
 * Optional second opinion for names no keyword matches. Returns one of `allowedLabels` or
 * null. Implementations may throw; callers treat that as no result.
 */
export interface ExternalClassifier {
  classify(text: string, allowedLabels: readonly string[], signal?: AbortSignal): Promise<string | null>;
}

export interface ChannelClassifierOptions {
  external?: ExternalClassifier | null;
  timeoutMs: number;
  maxCallsPerPass: number;
  logger?: Logger;
}

export interface ClassificationPassOptions {
  signal?: AbortSignal;
  stats?: PassStats;
}

export type ClassifyFn = (displayName: string, region: CompiledRegion) => Promise<ClassificationResult>;

/** First category, in table order, with a keyword contained in the name. */
export const matchKeyword = (displayName: string, region: CompiledRegion): ClassificationResult | null => {
  const haystack = normalizeForMatch(displayName);
  for (const category of region.categories) {
    const keyword = category.keywords.find((kw) => haystack.includes(kw));
    if (keyword) {
      return { category: category.name, provenance: 'keyword', keyword };
    }
  }
  return null;
};

export class ChannelClassifier {
  constructor(private readonly options: ChannelClassifierOptions) {}

  get hasExternal(): boolean {
    return Boolean(this.options.external) && this.options.maxCallsPerPass > 0;
  }

  /**
   * Starts one playlist pass. The returned function shares a memo of external answers and a
   * call budget that both end with the pass.
   */
  startPass(passOptions: ClassificationPassOptions = {}): ClassifyFn {
    const { external, timeoutMs, logger } = this.options;
    const memo = new Map<string, string | null>();
    let callsLeft = this.options.maxCallsPerPass;

    const askExternal = async (displayName: string, region: CompiledRegion): Promise<string | null> => {
      if (!external) return null;
      const memoKey = `${region.tag}\u0000${normalizeForMatch(displayName)}`;
      const remembered = memo.get(memoKey);
      if (remembered !== undefined) return remembered;
      if (callsLeft <= 0) return null;
      callsLeft -= 1;

      let label: string | null = null;
      try {
        const answer = await withDeadline(
          (signal) => external.classify(displayName, region.labels, signal),
          timeoutMs,
          passOptions.signal,
        );
        label = answer !== null && region.labels.includes(answer) ? answer : null;
      } catch (error) {
        if (passOptions.signal?.aborted) throw error;
        if (passOptions.stats) passOptions.stats.externalFailures += 1;
        logger?.debug('External classifier failed', {
          displayName,
          region: region.tag,
          timedOut: error instanceof TimeoutError,
          error: errorMessage(error),
        });
      }
      memo.set(memoKey, label);
      return label;
    };

    return async (displayName, region) => {
      const byKeyword = matchKeyword(displayName, region);
      if (byKeyword) return byKeyword;

      const label = await askExternal(displayName, region);
      if (label) {
        return { category: label, provenance: 'external' };
      }

      logger?.debug('No category matched, using region fallback', { displayName, region: region.tag });
      return { category: region.generalCategory, provenance: 'fallback' };
    };
  }
}
