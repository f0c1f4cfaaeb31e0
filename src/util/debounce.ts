type DeferredAction = () => unknown;

/**
 * Single-slot trailing debounce. Each schedule() replaces whatever is pending,
 * so an action only runs after `delayMs` of quiet.
 */
export class DebounceScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly onError: (err: unknown) => void = (err) => console.error("[debounce] deferred action failed:", err),
  ) {}

  get pending(): boolean {
    return this.timer !== null;
  }

  schedule(action: DeferredAction, delayMs: number): void {
    this.cancel();
    this.timer = setTimeout(() => this.fire(action), Math.max(0, delayMs));
  }

  cancel(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
  }

  private fire(action: DeferredAction): void {
    this.timer = null;
    try {
      void Promise.resolve(action()).catch(this.onError);
    } catch (err) {
      this.onError(err);
    }
  }
}
