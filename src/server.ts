/**
 * HTTP Server Entry Point
 * Initializes and starts the Express application on a specified port.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { initializeApp } from "./config/init.js";

async function main(): Promise<void> {
  const config = await initializeApp(loadConfig());

  /** HTTP server instance wrapping the Express application. */
  const server = createServer(createApp({ config }));

  server.listen(config.port, "0.0.0.0", () => {
    console.log(`Server running on 0.0.0.0:${config.port}`);
    console.log(`CORS origin: ${config.frontendOrigin}`);
  });

  /**
   * Handles graceful shutdown on SIGTERM signal.
   * Closes the server and exits the process cleanly.
   */
  process.on("SIGTERM", () => {
    server.close(() => process.exit(0));
  });
}

main().catch((error) => {
  console.error("✗ Server failed to start:", error);
  process.exit(1);
});
