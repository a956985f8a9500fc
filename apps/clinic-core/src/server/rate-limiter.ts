interface ClientWindow {
  startedAtMs: number;
  remaining: number;
}

/**
 * Gives each client `limit` requests per window, counted from its first request. Clients whose
 * window has run out are forgotten on the next sweep, at most once per window.
 */
export class ClientRateLimiter {
  private readonly windows = new Map<string, ClientWindow>();
  private lastSweepMs: number;

  constructor(
    private readonly limit: number,
    private readonly windowMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {
    this.lastSweepMs = now();
  }

  get trackedClients(): number {
    return this.windows.size;
  }

  allow(clientKey: string): boolean {
    const now = this.now();
    this.sweep(now);

    let window = this.windows.get(clientKey);
    if (window === undefined || this.hasExpired(window, now)) {
      window = { startedAtMs: now, remaining: this.limit };
      this.windows.set(clientKey, window);
    }

    if (window.remaining === 0) {
      return false;
    }

    window.remaining -= 1;
    return true;
  }

  private hasExpired(window: ClientWindow, now: number): boolean {
    return now - window.startedAtMs >= this.windowMs;
  }

  private sweep(now: number): void {
    if (now - this.lastSweepMs < this.windowMs) {
      return;
    }

    this.lastSweepMs = now;
    for (const [clientKey, window] of this.windows) {
      if (this.hasExpired(window, now)) {
        this.windows.delete(clientKey);
      }
    }
  }
}
