#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { HttpLightEndpoint } from "./adapters/http.js";
import { loadConfig } from "./config.js";
import { LightController } from "./controller.js";
import { ConsoleNotifier } from "./notify.js";
import { buildServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const endpoint = new HttpLightEndpoint(config.endpoint);
  // Bell off: stderr belongs to the MCP host here.
  const controller = new LightController(endpoint, config.controller, new ConsoleNotifier(false));
  const server = buildServer(controller);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`light-keys MCP server running (stdio) -> ${endpoint.url}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
