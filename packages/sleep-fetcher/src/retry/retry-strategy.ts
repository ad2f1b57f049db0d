import { FetcherError } from '../errors.js';
import type {
  FailureClass,
  RetryDecision,
  RetryReason,
  RetryStrategyConfig,
} from './types.js';

const DEFAULT_CONFIG: RetryStrategyConfig = {
  maxRetries: 3,
  delayMs: 5000,
};

export class RetryStrategy {
  private readonly config: RetryStrategyConfig;

  constructor(config?: Partial<RetryStrategyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  /**
   * Errors raised by this package (bad cursor, store write, stalled cursor)
   * end the run. Anything else thrown mid-iteration is worth another try.
   */
  classify(error: unknown): FailureClass {
    return error instanceof FetcherError ? 'fatal' : 'transient';
  }

  /**
   * `attempt` is the consecutive failure count including the one just seen.
   * The run stops once it reaches `maxRetries`.
   */
  decide(reason: RetryReason, attempt: number): RetryDecision {
    return {
      shouldRetry: attempt < this.config.maxRetries,
      delayMs: this.config.delayMs,
      reason,
    };
  }
}
