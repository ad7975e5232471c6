import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDemoToolHost } from "./demoToolHost.js";

/**
 * Runs the demonstration Tool Host as its own process, speaking MCP over
 * stdio. stdout carries protocol frames, so logging goes to stderr.
 */
async function main(): Promise<void> {
  console.log = console.error;

  const server = createDemoToolHost();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[DemoToolHost] Listening on stdio");

  process.on("SIGINT", () => {
    server
      .close()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("[DemoToolHost] Error during shutdown:", error);
        process.exit(1);
      });
  });
}

main().catch((error) => {
  console.error("[DemoToolHost] Fatal:", error);
  process.exit(1);
});
