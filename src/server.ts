import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LightController } from "./controller.js";
import type { SyncResult } from "./util/types.js";

const DirectionSchema = z.enum(["up", "down"]).describe("Step direction");

function text(t: string) {
  return { content: [{ type: "text" as const, text: t }] };
}

function describeSync(result: SyncResult): string {
  const state = JSON.stringify(result.state);
  return result.ok ? `Light updated: ${state}` : `Light update failed: ${result.error} (desired state ${state})`;
}

export function buildServer(controller: LightController): McpServer {
  const server = new McpServer({ name: "light-keys", version: "0.1.0" });

  server.registerTool("light_toggle", {
    description: "Toggle the light on/off. Sent immediately.",
    inputSchema: {}
  }, async () => {
    const result = await controller.togglePower();
    return text(describeSync(result));
  });

  server.registerTool("light_brightness", {
    description: "Step brightness up or down. Rapid steps are coalesced into one update.",
    inputSchema: { direction: DirectionSchema }
  }, async ({ direction }) => {
    controller.stepBrightness(direction);
    return text(`Brightness ${controller.getState().brightness}, update scheduled.`);
  });

  server.registerTool("light_temperature", {
    description: "Step color temperature up or down. Rapid steps are coalesced into one update.",
    inputSchema: { direction: DirectionSchema }
  }, async ({ direction }) => {
    controller.stepTemperature(direction);
    return text(`Temperature ${controller.getState().temperature}, update scheduled.`);
  });

  server.registerTool("light_sync", {
    description: "Send the current desired state to the light right away.",
    inputSchema: {}
  }, async () => {
    const result = await controller.synchronizeNow();
    return text(describeSync(result));
  });

  server.registerTool("light_get_state", {
    description: "Get the desired power/brightness/temperature (not read back from the device).",
    inputSchema: {}
  }, async () => {
    return text(JSON.stringify(controller.getState(), null, 2));
  });

  return server;
}
