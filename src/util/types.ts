export type DeviceState = {
  power: boolean;
  brightness: number;
  temperature: number; // device units, 143 (cool) – 344 (warm)
};

export type Direction = "up" | "down";

export type Range = { min: number; max: number };

export type StepRange = Range & {
  step: number;
  initial: number;
};

export type ControllerSettings = {
  brightness: StepRange;
  temperature: StepRange;
  debounceMs: number;
};

export type EndpointSettings = {
  host: string;
  port: number;
  path: string;
  timeoutMs: number;
  dryRun: boolean;
};

export type LightConfig = {
  endpoint: EndpointSettings;
  controller: ControllerSettings;
};

export type LightUpdatePayload = {
  numberOfLights: 1;
  lights: [{ on: 0 | 1; brightness: number; temperature: number }];
};

export type SyncResult =
  | { ok: true; state: DeviceState }
  | { ok: false; state: DeviceState; error: string };
