#!/usr/bin/env node
import { emitKeypressEvents } from "node:readline";
import { HttpLightEndpoint } from "./adapters/http.js";
import { loadConfig } from "./config.js";
import { LightController } from "./controller.js";
import { attachKeyboard } from "./keyboard.js";
import { ConsoleNotifier } from "./notify.js";

async function main() {
  const config = loadConfig();
  const endpoint = new HttpLightEndpoint(config.endpoint);
  const controller = new LightController(endpoint, config.controller, new ConsoleNotifier());

  const stdin = process.stdin;
  emitKeypressEvents(stdin);
  if (stdin.isTTY) stdin.setRawMode(true);

  const detach = attachKeyboard(stdin, controller, {
    onQuit: () => {
      detach();
      if (stdin.isTTY) stdin.setRawMode(false);
      stdin.pause();
      controller.shutdown().then(
        () => process.exit(0),
        (e: unknown) => {
          console.error(e);
          process.exit(1);
        },
      );
    },
  });
  stdin.resume();

  console.error(`light-keys controlling ${endpoint.url}${config.endpoint.dryRun ? " (dry run)" : ""}`);
  console.error("  t/space toggle · up/down brightness · left/right temperature · q quit");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
