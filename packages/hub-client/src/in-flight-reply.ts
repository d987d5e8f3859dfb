/**
 * Lifecycle of one issued call
 */
export type ReplyState = 'pending' | 'finished' | 'failed' | 'aborted';

/**
 * Why a pending reply was aborted
 */
export type AbortCause = 'aborted' | 'timeout';

/**
 * Handle for a call in flight. Returned immediately; the outcome arrives on
 * `result`.
 */
export interface ReplyHandle<R> {
  readonly result: Promise<R>;
  readonly state: ReplyState;
  /** Abort the call. Safe to call repeatedly; a no-op once settled. */
  abort(cause?: AbortCause): void;
}

/**
 * ReplyHandle backed by an AbortController. The executor receives the
 * signal and must reject once it fires; the abort cause is exposed as the
 * signal's `reason`.
 */
export class InFlightReply<R> implements ReplyHandle<R> {
  readonly result: Promise<R>;

  private readonly controller = new AbortController();
  private currentState: ReplyState = 'pending';
  private readonly settledListeners: (() => void)[] = [];

  constructor(executor: (signal: AbortSignal) => Promise<R>) {
    this.result = executor(this.controller.signal).then(
      (value) => {
        this.settle('finished');
        return value;
      },
      (error: unknown) => {
        this.settle(this.controller.signal.aborted ? 'aborted' : 'failed');
        throw error;
      }
    );
  }

  get state(): ReplyState {
    return this.currentState;
  }

  abort(cause: AbortCause = 'aborted'): void {
    if (this.currentState !== 'pending' || this.controller.signal.aborted) return;
    this.controller.abort(cause);
  }

  /**
   * Run `listener` once the reply settles, whatever the outcome.
   */
  onSettled(listener: () => void): void {
    if (this.currentState !== 'pending') {
      listener();
      return;
    }
    this.settledListeners.push(listener);
  }

  private settle(state: Exclude<ReplyState, 'pending'>): void {
    this.currentState = state;
    for (const listener of this.settledListeners.splice(0)) {
      listener();
    }
  }
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts, whether or not the underlying work listens to the signal.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
