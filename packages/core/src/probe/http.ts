/**
 * @title HTTP Deadline Utilities
 * @description Per-node deadlines and error mapping for network inspectors.
 *
 * @module probe
 */

import { CancellationError, NetworkError, getErrorMessage, isVastLintError } from "../errors.js";
import type { HttpClient } from "../hooks/types.js";

/** Default per-node deadline for network inspectors, in milliseconds. */
export const DEFAULT_NETWORK_TIMEOUT = 2000;

/**
 * A cancellable deadline. Call {@link Deadline.clear} once the guarded work
 * has settled.
 */
export interface Deadline {
	signal: AbortSignal;
	clear(): void;
}

/**
 * Create a deadline linked to an optional caller signal.
 *
 * The signal aborts with a {@link NetworkError} when the timeout passes and
 * with a {@link CancellationError} when the caller signal aborts.
 *
 * @param timeout - Deadline in milliseconds
 * @param parent - Caller cancellation signal
 */
export function createDeadline(timeout: number, parent?: AbortSignal): Deadline {
	const controller = new AbortController();

	if (parent?.aborted) {
		controller.abort(new CancellationError());
		return { signal: controller.signal, clear: () => undefined };
	}

	const timeoutId = setTimeout(() => {
		controller.abort(new NetworkError(`request timed out after ${timeout}ms`));
	}, timeout);

	const onParentAbort = (): void => {
		controller.abort(new CancellationError());
	};
	parent?.addEventListener("abort", onParentAbort, { once: true });

	return {
		signal: controller.signal,
		clear: () => {
			clearTimeout(timeoutId);
			parent?.removeEventListener("abort", onParentAbort);
		},
	};
}

/**
 * Error describing why a signal was aborted.
 */
export function abortReason(signal: AbortSignal): Error {
	const reason: unknown = signal.reason;
	return reason instanceof Error ? reason : new CancellationError();
}

/**
 * Send one request, mapping failures to typed errors.
 *
 * An aborted signal surfaces as its reason (timeout or cancellation); other
 * transport failures become a {@link NetworkError} carrying the cause.
 */
export async function sendRequest(
	client: HttpClient,
	url: string,
	init: RequestInit & { signal: AbortSignal },
): Promise<Response> {
	if (init.signal.aborted) {
		throw abortReason(init.signal);
	}

	try {
		return await client(url, init);
	} catch (error) {
		if (init.signal.aborted) {
			throw abortReason(init.signal);
		}
		if (isVastLintError(error)) {
			throw error;
		}
		throw new NetworkError(getErrorMessage(error), { cause: error });
	}
}
