/** `null` means the login succeeded. */
export type LoginOutcome = Error | null;

/**
 * Holds at most one login outcome. `offer` never blocks: while the slot is
 * full, further outcomes are dropped, since only one callback is expected per
 * login attempt. `take` waits for the outcome and empties the slot.
 */
export class LoginResultSlot {
  private stored: { outcome: LoginOutcome } | null = null;
  private waiters: Array<(outcome: LoginOutcome) => void> = [];

  offer(outcome: LoginOutcome): boolean {
    if (this.stored) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(outcome);
      return true;
    }

    this.stored = { outcome };
    return true;
  }

  /** Rejects with the signal's reason if it aborts before an outcome arrives. */
  take(signal?: AbortSignal): Promise<LoginOutcome> {
    if (this.stored) {
      const { outcome } = this.stored;
      this.stored = null;
      return Promise.resolve(outcome);
    }

    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise((resolve, reject) => {
      const waiter = (outcome: LoginOutcome): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve(outcome);
      };
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
        reject(signal?.reason);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}
