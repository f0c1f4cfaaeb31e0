import type { LightEndpoint } from "./adapters/http.js";
import { ConsoleNotifier, type Notifier } from "./notify.js";
import { DebounceScheduler } from "./util/debounce.js";
import { describeError } from "./util/errors.js";
import type { ControllerSettings, DeviceState, Direction, Range, SyncResult } from "./util/types.js";

type SteppedKey = "brightness" | "temperature";

export function isDirection(value: string): value is Direction {
  return value === "up" || value === "down";
}

export function clamp(value: number, range: Range): number {
  return Math.max(range.min, Math.min(range.max, value));
}

/**
 * Owns the desired light state. Power changes go out immediately, steps are
 * debounced so a held key becomes one request once the key is released.
 */
export class LightController {
  private readonly state: DeviceState;
  private readonly scheduler: DebounceScheduler;
  // Chains every outgoing update so the endpoint never sees two at once.
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly endpoint: LightEndpoint,
    private readonly settings: ControllerSettings,
    private readonly notifier: Notifier = new ConsoleNotifier(),
  ) {
    this.state = {
      power: false,
      brightness: clamp(settings.brightness.initial, settings.brightness),
      temperature: clamp(settings.temperature.initial, settings.temperature),
    };
    this.scheduler = new DebounceScheduler();
  }

  getState(): DeviceState {
    return { ...this.state };
  }

  get pendingSync(): boolean {
    return this.scheduler.pending;
  }

  togglePower(): Promise<SyncResult> {
    this.state.power = !this.state.power;
    return this.synchronizeNow();
  }

  stepBrightness(direction: string): boolean {
    return this.step("brightness", direction);
  }

  stepTemperature(direction: string): boolean {
    return this.step("temperature", direction);
  }

  synchronizeNow(): Promise<SyncResult> {
    const snapshot = this.getState();
    const run = this.queue.then(() => this.send(snapshot));
    this.queue = run.catch(() => undefined);
    return run;
  }

  async settled(): Promise<void> {
    await this.queue;
  }

  /** Sends a pending debounced update right away, then waits for the queue to drain. */
  async shutdown(): Promise<void> {
    if (this.scheduler.pending) {
      this.scheduler.cancel();
      await this.synchronizeNow();
    }
    await this.settled();
  }

  dispose(): void {
    this.scheduler.cancel();
  }

  private step(key: SteppedKey, direction: string): boolean {
    if (!isDirection(direction)) return false;
    const range = this.settings[key];
    const delta = direction === "up" ? range.step : -range.step;
    this.state[key] = clamp(this.state[key] + delta, range);
    this.scheduler.schedule(() => this.synchronizeNow(), this.settings.debounceMs);
    return true;
  }

  private async send(state: DeviceState): Promise<SyncResult> {
    try {
      await this.endpoint.update(state);
      return { ok: true, state };
    } catch (err) {
      const error = describeError(err);
      try {
        this.notifier.syncFailed(error, state);
      } catch (notifyErr) {
        console.error("[light] notifier failed:", notifyErr);
      }
      return { ok: false, state, error };
    }
  }
}
