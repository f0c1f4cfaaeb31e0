import type { DeviceState } from "./util/types.js";

export interface Notifier {
  syncFailed(message: string, state: DeviceState): void;
}

export class ConsoleNotifier implements Notifier {
  constructor(private readonly bell = process.stderr.isTTY === true) {}

  syncFailed(message: string, state: DeviceState): void {
    if (this.bell) process.stderr.write("\u0007");
    console.error(`Light update failed: ${message}`);
    console.error(`  desired state kept: ${JSON.stringify(state)}`);
  }
}
