/**
 * Token Counting Utilities
 *
 * Measures text in model-relevant subword units. Uses the cl100k_base BPE
 * from js-tiktoken once loaded and a characters-per-token estimate until then.
 */

import { type Logger, resolveLogger } from '../logging/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Encoder contract, satisfied by js-tiktoken's `Tiktoken` and by test doubles
 */
export interface TokenizerInterface {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export interface TokenCounterConfig {
  /** Characters per unit in estimation mode (English technical prose is close to 4) */
  charsPerToken: number;
  /** Whether initializeTokenizer() may load the BPE */
  useTokenizer: boolean;
  /** BPE name passed to js-tiktoken */
  encoding: 'cl100k_base' | 'o200k_base' | 'p50k_base';
  maxCacheSize: number;
}

export type TokenCountMethod = 'tokenizer' | 'estimation';

// =============================================================================
// Token Counter Class
// =============================================================================

export class TokenCounter {
  private readonly config: TokenCounterConfig;
  private readonly logger: Logger;
  private tokenizer: TokenizerInterface | null = null;
  private tokenizerLoadPromise: Promise<void> | null = null;
  private cache: Map<string, number> = new Map();

  constructor(config?: Partial<TokenCounterConfig>, logger?: Logger) {
    this.config = {
      charsPerToken: config?.charsPerToken ?? 4,
      useTokenizer: config?.useTokenizer ?? true,
      encoding: config?.encoding ?? 'cl100k_base',
      maxCacheSize: config?.maxCacheSize ?? 10000,
    };
    this.logger = resolveLogger('token-counter', logger);
  }

  /**
   * Load the BPE. Falls back to estimation (and returns false) if it cannot be loaded.
   */
  async initializeTokenizer(): Promise<boolean> {
    if (!this.config.useTokenizer) {
      return false;
    }
    if (this.tokenizer) {
      return true;
    }
    if (!this.tokenizerLoadPromise) {
      this.tokenizerLoadPromise = this.loadTokenizer();
    }
    await this.tokenizerLoadPromise;
    return this.tokenizer !== null;
  }

  private async loadTokenizer(): Promise<void> {
    try {
      const { getEncoding } = await import('js-tiktoken');
      this.setTokenizer(getEncoding(this.config.encoding));
    } catch (error) {
      this.logger.warn('Failed to load tokenizer, falling back to estimation', {
        encoding: this.config.encoding,
        reason: error instanceof Error ? error.message : String(error),
      });
      this.tokenizer = null;
    }
  }

  /**
   * Set an external tokenizer (for testing or custom vocabularies)
   */
  setTokenizer(tokenizer: TokenizerInterface): void {
    this.tokenizer = tokenizer;
    this.cache.clear();
  }

  hasTokenizer(): boolean {
    return this.tokenizer !== null;
  }

  getMethod(): TokenCountMethod {
    return this.tokenizer ? 'tokenizer' : 'estimation';
  }

  getCharsPerToken(): number {
    return this.config.charsPerToken;
  }

  /**
   * Number of units in `text`
   */
  count(text: string): number {
    if (text.length === 0) {
      return 0;
    }
    const cached = this.cache.get(text);
    if (cached !== undefined) {
      return cached;
    }

    const count = this.tokenizer
      ? this.tokenizer.encode(text).length
      : Math.ceil(text.length / this.config.charsPerToken);

    this.addToCache(text, count);
    return count;
  }

  fits(text: string, budget: number): boolean {
    return this.count(text) <= budget;
  }

  /**
   * Text of the first `units` units
   */
  head(text: string, units: number): string {
    if (units <= 0 || text.length === 0) {
      return '';
    }
    if (this.tokenizer) {
      const tokens = this.tokenizer.encode(text);
      return tokens.length <= units ? text : this.tokenizer.decode(tokens.slice(0, units));
    }
    return text.slice(0, Math.floor(units * this.config.charsPerToken));
  }

  /**
   * Text of the last `units` units
   */
  tail(text: string, units: number): string {
    if (units <= 0 || text.length === 0) {
      return '';
    }
    if (this.tokenizer) {
      const tokens = this.tokenizer.encode(text);
      return tokens.length <= units ? text : this.tokenizer.decode(tokens.slice(-units));
    }
    const chars = Math.floor(units * this.config.charsPerToken);
    return chars >= text.length ? text : text.slice(text.length - chars);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  private addToCache(text: string, count: number): void {
    // Evict the oldest quarter once full
    if (this.cache.size >= this.config.maxCacheSize) {
      const evict = Math.ceil(this.config.maxCacheSize / 4);
      let removed = 0;
      for (const key of this.cache.keys()) {
        if (removed >= evict) break;
        this.cache.delete(key);
        removed++;
      }
    }
    this.cache.set(text, count);
  }
}

// =============================================================================
// Global Instance
// =============================================================================

let globalCounter: TokenCounter | null = null;

export function getGlobalTokenCounter(): TokenCounter {
  if (!globalCounter) {
    globalCounter = new TokenCounter();
  }
  return globalCounter;
}

export function resetGlobalTokenCounter(): void {
  globalCounter = null;
}

/**
 * Count units with the global counter
 */
export function countTokens(text: string): number {
  return getGlobalTokenCounter().count(text);
}
