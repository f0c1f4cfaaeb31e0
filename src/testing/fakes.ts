import type { LightEndpoint } from "../adapters/http.js";
import type { ControllerSettings, DeviceState } from "../util/types.js";

export const TEST_SETTINGS: ControllerSettings = {
  debounceMs: 250,
  brightness: { min: 3, max: 100, step: 10, initial: 50 },
  temperature: { min: 143, max: 344, step: 10, initial: 170 },
};

export function withInitial(brightness: number, temperature = TEST_SETTINGS.temperature.initial): ControllerSettings {
  return {
    ...TEST_SETTINGS,
    brightness: { ...TEST_SETTINGS.brightness, initial: brightness },
    temperature: { ...TEST_SETTINGS.temperature, initial: temperature },
  };
}

/** Records every update; queued failures are thrown by the next calls, in order. */
export class RecordingEndpoint implements LightEndpoint {
  readonly sent: DeviceState[] = [];
  readonly failures: Error[] = [];

  async update(state: DeviceState): Promise<void> {
    this.sent.push(state);
    const failure = this.failures.shift();
    if (failure) throw failure;
  }
}
