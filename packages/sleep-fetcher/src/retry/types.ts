type RetryReason = 'empty-batch' | 'unexpected-error';

type FailureClass = 'transient' | 'fatal';

type RetryDecision = {
  shouldRetry: boolean;
  delayMs: number;
  reason: RetryReason;
};

type RetryStrategyConfig = {
  maxRetries: number;
  delayMs: number;
};

export type { RetryReason, FailureClass, RetryDecision, RetryStrategyConfig };
