export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  retryableErrorCodes: string[];
}

// Postgres SQLSTATEs for serialization_failure and deadlock_detected.
export const TRANSACTION_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 50,
  maxDelayMs: 1000,
  retryableErrorCodes: ['40001', '40P01'],
};

export interface RetryExecutorDependencies {
  sleep(ms: number): Promise<void>;
  random(): number;
}

const defaultDependencies: RetryExecutorDependencies = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: () => Math.random(),
};

export function getErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }

  return typeof error.code === 'string' ? error.code : null;
}

export class RetryExecutor {
  constructor(private readonly dependencies: RetryExecutorDependencies = defaultDependencies) {}

  getBackoffDelayMs(attempt: number, policy: RetryPolicy): number {
    const exponential = policy.initialDelayMs * 2 ** (attempt - 1);
    const capped = Math.min(exponential, policy.maxDelayMs);
    const jitter = Math.floor(capped * 0.1 * this.dependencies.random());
    return Math.min(capped + jitter, policy.maxDelayMs);
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy = TRANSACTION_RETRY_POLICY,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;
        const code = getErrorCode(error);
        const retryable = code !== null && policy.retryableErrorCodes.includes(code);
        if (!retryable || attempt === policy.maxAttempts) {
          throw error;
        }

        await this.dependencies.sleep(this.getBackoffDelayMs(attempt, policy));
      }
    }

    throw lastError;
  }
}
