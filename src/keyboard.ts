import type { EventEmitter } from "node:events";
import type { Key } from "node:readline";
import type { LightController } from "./controller.js";
import { dispatchIntent, type Intent } from "./intents.js";

export type KeyBindings = Readonly<Record<string, Intent>>;

export const DEFAULT_BINDINGS: KeyBindings = {
  t: "toggle",
  space: "toggle",
  up: "brightness:up",
  down: "brightness:down",
  right: "temperature:up",
  left: "temperature:down",
};

export type KeyboardOptions = {
  bindings?: KeyBindings;
  onQuit?: () => void;
};

type KeyboardTarget = Pick<LightController, "togglePower" | "stepBrightness" | "stepTemperature">;

export function intentForKey(key: Key | undefined, bindings: KeyBindings = DEFAULT_BINDINGS): Intent | null {
  if (!key?.name || key.ctrl || key.meta) return null;
  return Object.hasOwn(bindings, key.name) ? bindings[key.name] : null;
}

function isQuit(key: Key | undefined): boolean {
  return key?.name === "q" || (key?.ctrl === true && key.name === "c");
}

/**
 * Listens for readline "keypress" events (see readline.emitKeypressEvents)
 * and forwards bound keys to the controller. Returns a detach function.
 */
export function attachKeyboard(input: EventEmitter, controller: KeyboardTarget, options: KeyboardOptions = {}): () => void {
  const bindings = options.bindings ?? DEFAULT_BINDINGS;

  const onKeypress = (_str: string | undefined, key: Key | undefined) => {
    if (isQuit(key)) {
      options.onQuit?.();
      return;
    }
    const intent = intentForKey(key, bindings);
    if (!intent) return;
    // Failures are reported through the controller's notifier; the promise never rejects.
    void dispatchIntent(controller, intent);
  };

  input.on("keypress", onKeypress);
  return () => {
    input.off("keypress", onKeypress);
  };
}
