type WarningWindow = {
  readonly emittedAtMs: number;
  readonly suppressed: number;
};

export type WarningDecision =
  | { readonly emit: true; readonly suppressedSinceLast: number }
  | { readonly emit: false };

// Lets one warning per key through per cooldown window and counts the rest.
export class RateLimitedWarningEmitter {
  private readonly windows: Map<string, WarningWindow> = new Map<string, WarningWindow>();

  public constructor(
    private readonly cooldownMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  public check(key: string): WarningDecision {
    const nowMs: number = this.now();
    const window: WarningWindow | undefined = this.windows.get(key);

    if (window !== undefined && nowMs - window.emittedAtMs < this.cooldownMs) {
      this.windows.set(key, { emittedAtMs: window.emittedAtMs, suppressed: window.suppressed + 1 });
      return { emit: false };
    }

    this.windows.set(key, { emittedAtMs: nowMs, suppressed: 0 });
    return { emit: true, suppressedSinceLast: window?.suppressed ?? 0 };
  }
}
