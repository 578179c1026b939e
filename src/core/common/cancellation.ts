import { EventEmitter } from 'events';
import type { IncompleteReason } from '../../shared/types';

export interface Disposable {
	dispose(): void;
}

/**
 * Read-only view of a cancellation request, polled by long-running work.
 */
export interface CancellationToken {
	readonly isCancellationRequested: boolean;
	/** Why cancellation was requested (undefined until then) */
	readonly reason: IncompleteReason | undefined;
	onCancellationRequested(listener: (reason: IncompleteReason) => void): Disposable;
}

/**
 * Cooperative cancellation source backed by an AbortController.
 * The first `cancel()` wins; later calls keep the original reason.
 */
export class CancellationTokenSource implements Disposable {
	private readonly controller = new AbortController();
	private readonly events = new EventEmitter();
	private cancelReason: IncompleteReason | undefined;
	private parentSubscription: Disposable | undefined;

	readonly token: CancellationToken;

	/**
	 * Creates a token source, optionally linked to a parent token.
	 * @param parent - When cancelled, this source is cancelled with the same reason.
	 */
	constructor(parent?: CancellationToken) {
		const source = this;
		this.token = {
			get isCancellationRequested() {
				return source.controller.signal.aborted;
			},
			get reason() {
				return source.cancelReason;
			},
			onCancellationRequested: (listener) => this.subscribe(listener),
		};

		if (parent) {
			if (parent.isCancellationRequested) this.cancel(parent.reason ?? 'cancelled');
			else this.parentSubscription = parent.onCancellationRequested((reason) => this.cancel(reason));
		}
	}

	/**
	 * Requests cancellation.
	 * @param reason - Reason recorded on the token.
	 * @returns void
	 */
	cancel(reason: IncompleteReason = 'cancelled'): void {
		if (this.controller.signal.aborted) return;
		this.cancelReason = reason;
		this.controller.abort(reason);
		this.events.emit('cancel', reason);
	}

	/**
	 * Detaches listeners and the parent link. The token keeps its final state.
	 * @returns void
	 */
	dispose(): void {
		this.parentSubscription?.dispose();
		this.parentSubscription = undefined;
		this.events.removeAllListeners();
	}

	private subscribe(listener: (reason: IncompleteReason) => void): Disposable {
		// Late subscribers still hear about a cancellation that already happened.
		if (this.cancelReason) {
			const reason = this.cancelReason;
			queueMicrotask(() => listener(reason));
			return { dispose: () => {} };
		}

		this.events.once('cancel', listener);
		return { dispose: () => this.events.off('cancel', listener) };
	}
}

/**
 * A token that is never cancelled, for callers that do not need cancellation.
 */
export const neverCancelledToken: CancellationToken = Object.freeze({
	isCancellationRequested: false,
	reason: undefined,
	onCancellationRequested: () => ({ dispose: () => {} }),
});
