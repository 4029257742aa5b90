import { Injectable, Logger } from '@nestjs/common';

export interface RetryConfig {
	maxAttempts?: number;
	baseDelay?: number;
	maxDelay?: number;
	exponentialBackoff?: boolean;
	/** Decides whether a failed attempt may be repeated. Defaults to retrying everything. */
	shouldRetry?: (error: unknown, attempt: number) => boolean;
	onFailure?: (error: unknown, attempt: number) => void;
	operationName?: string;
}

@Injectable()
export class RetryService {
	private readonly logger = new Logger(RetryService.name);

	/**
	 * Wrap an async function with bounded retry logic.
	 *
	 * The delay before attempt `n + 1` is `baseDelay * 2^(n - 1)` (capped at `maxDelay`),
	 * or a flat `baseDelay` when exponential backoff is disabled. The error of the last
	 * attempt is rethrown unchanged.
	 */
	async executeWithRetry<T>(fn: (attempt: number) => Promise<T>, config?: RetryConfig): Promise<T> {
		const maxAttempts = Math.max(1, config?.maxAttempts ?? 3);
		const baseDelay = config?.baseDelay ?? 1000;
		const maxDelay = config?.maxDelay ?? 60000;
		const exponentialBackoff = config?.exponentialBackoff !== false;
		const operationName = config?.operationName ?? 'Operation';

		for (let attempt = 1; ; attempt++) {
			try {
				return await fn(attempt);
			} catch (error) {
				config?.onFailure?.(error, attempt);

				const retryable = config?.shouldRetry ? config.shouldRetry(error, attempt) : true;
				if (!retryable || attempt >= maxAttempts) {
					throw error;
				}

				const delay = this.getDelay(attempt, { baseDelay, maxDelay, exponentialBackoff });
				this.logger.warn(
					`${operationName} attempt ${attempt}/${maxAttempts} failed: ${describeError(error)}. Retrying in ${delay}ms...`,
				);
				await this.sleep(delay);
			}
		}
	}

	getDelay(
		attempt: number,
		{ baseDelay, maxDelay, exponentialBackoff }: { baseDelay: number; maxDelay: number; exponentialBackoff: boolean },
	): number {
		return exponentialBackoff ? Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay) : baseDelay;
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
