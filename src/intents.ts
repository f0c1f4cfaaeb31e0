import type { LightController } from "./controller.js";

export const INTENTS = [
  "toggle",
  "brightness:up",
  "brightness:down",
  "temperature:up",
  "temperature:down",
] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

type IntentTarget = Pick<LightController, "togglePower" | "stepBrightness" | "stepTemperature">;

export async function dispatchIntent(controller: IntentTarget, intent: Intent): Promise<void> {
  switch (intent) {
    case "toggle":
      await controller.togglePower();
      return;
    case "brightness:up":
      controller.stepBrightness("up");
      return;
    case "brightness:down":
      controller.stepBrightness("down");
      return;
    case "temperature:up":
      controller.stepTemperature("up");
      return;
    case "temperature:down":
      controller.stepTemperature("down");
      return;
  }
}
