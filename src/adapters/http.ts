import { fetch, type Dispatcher } from "undici";
import { LightEndpointError, describeError } from "../util/errors.js";
import type { DeviceState, EndpointSettings, LightUpdatePayload } from "../util/types.js";

export interface LightEndpoint {
  update(state: DeviceState): Promise<void>;
}

export function buildUpdatePayload(state: DeviceState): LightUpdatePayload {
  return {
    numberOfLights: 1,
    lights: [{ on: state.power ? 1 : 0, brightness: state.brightness, temperature: state.temperature }],
  };
}

export type HttpEndpointOptions = EndpointSettings & {
  // Tests route requests through undici's MockAgent.
  dispatcher?: Dispatcher;
};

export class HttpLightEndpoint implements LightEndpoint {
  readonly url: string;

  constructor(private readonly options: HttpEndpointOptions) {
    this.url = `http://${options.host}:${options.port}${options.path}`;
  }

  async update(state: DeviceState): Promise<void> {
    const payload = buildUpdatePayload(state);
    if (this.options.dryRun) {
      console.error("[DRY-RUN] update", payload);
      return;
    }

    const res = await fetch(this.url, {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.options.timeoutMs),
      dispatcher: this.options.dispatcher,
    }).catch((err: unknown) => {
      throw new LightEndpointError(`Light unreachable at ${this.url}: ${describeError(err)}`, { cause: err });
    });

    // The device echoes its state back; nothing here reads it.
    await res.body?.cancel();
    if (!res.ok) {
      throw new LightEndpointError(`Light API error ${res.status}: Request failed`, { status: res.status });
    }
  }
}
