import { CancellationTokenSource, type CancellationToken } from '../../../common/cancellation';

// Largest delay setTimeout honours; longer delays fire immediately.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface TimeoutGovernorOptions {
	/** Deadline in milliseconds */
	timeoutMs: number;
	/** Outer token (user cancel, superseding scan) linked into the task's token */
	cancellationToken?: CancellationToken;
}

export interface GovernedResult<T> {
	value: T;
	/** True when the deadline fired before the task settled */
	timedOut: boolean;
}

/**
 * Runs a task against a wall-clock deadline.
 *
 * When the deadline fires the task's token is cancelled with reason `time_limit`,
 * and the governor keeps awaiting the task so the caller always gets the task's own
 * (possibly partial) value. The bound is therefore as tight as the task's
 * cancellation checks. The timer is cleared as soon as the task settles.
 * @param task - Work that polls the provided token.
 * @param options - Deadline and optional outer token.
 * @returns The task's value and whether the deadline fired.
 */
export async function runWithTimeout<T>(
	task: (cancellationToken: CancellationToken) => Promise<T>,
	{ timeoutMs, cancellationToken }: TimeoutGovernorOptions
): Promise<GovernedResult<T>> {
	const source = new CancellationTokenSource(cancellationToken);
	let timedOut = false;

	const timer = setTimeout(() => {
		timedOut = true;
		source.cancel('time_limit');
	}, Math.min(MAX_TIMER_DELAY_MS, Math.max(0, timeoutMs)));

	try {
		const value = await task(source.token);
		return { value, timedOut };
	} finally {
		clearTimeout(timer);
		source.dispose();
	}
}
