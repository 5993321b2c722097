import { errorMessage, TransportError } from "../Errors";
import { getLog } from "../shared/logger";

const logger = getLog(import.meta);

export interface FailureClass {
	retryable: boolean;
	/** HTTP status when the service answered, undefined for connection failures */
	status?: number;
}

export interface RetryOptions {
	/** Retries after the first attempt; 0 disables retrying */
	maxRetries: number;
	/** Delay before the first retry, doubled for each one after */
	backoffMs: number;
	classify(err: unknown): FailureClass;
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Request timeouts, lock conflicts, rate limits and server errors are worth another attempt.
 */
export function shouldRetryStatus(status: number): boolean {
	return status === 408 || status === 409 || status === 429 || status >= 500;
}

function wait(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs an operation, retrying failures the classifier calls retryable with exponential backoff.
 * Every final failure is raised as a TransportError carrying the attempt count and the last cause.
 */
export async function withRetry<T>(label: string, operation: () => Promise<T>, options: RetryOptions): Promise<T> {
	const sleep = options.sleep ?? wait;
	let attempt = 0;

	while (true) {
		try {
			return await operation();
		} catch (err) {
			const { retryable, status } = options.classify(err);
			const errMsg = errorMessage(err);
			const reason = status === undefined ? "network error" : `${status}`;

			if (retryable && attempt < options.maxRetries) {
				const delay = options.backoffMs * 2 ** attempt;
				attempt += 1;
				logger.warn(
					`${label}: ${reason} (${errMsg}) - retrying in ${delay}ms (attempt ${attempt}/${options.maxRetries})`,
				);
				await sleep(delay);
				continue;
			}

			const attempts = attempt + 1;
			logger.error(`${label}: giving up after ${attempts} attempt(s) - ${errMsg}`);
			throw new TransportError(`${label} failed after ${attempts} attempt(s): ${errMsg}`, {
				...(status !== undefined ? { status } : {}),
				attempts,
				cause: err,
			});
		}
	}
}
