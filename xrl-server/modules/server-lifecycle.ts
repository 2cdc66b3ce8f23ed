// Server lifecycle: port selection, listening, graceful shutdown

import type express from "express";
import type { Server } from "http";
import os from "os";
import { logError, logInfo } from "./logger.js";
import type { RenderService } from "./page-renderer.js";
import { getAvailablePort } from "./shared.js";

/**
 * Server startup and initialization logic
 */
export async function startServer(
  app: express.Application,
  requestedPort: number,
  serverHost: string
): Promise<{ server: Server; port: number }> {
  logInfo(`Starting XRL Demo Server...`);
  logInfo(`Requested port: ${requestedPort}`);

  const port = await getAvailablePort(requestedPort);
  if (port !== requestedPort) {
    console.log(`\n====================================`);
    console.log(`NOTICE: Requested port ${requestedPort} was in use.`);
    console.log(`Using port ${port} instead.`);
    console.log(`====================================\n`);
  }

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, serverHost, () => {
      listening.off("error", reject);
      resolve(listening);
    });
    listening.once("error", reject);
  });

  console.log(`\n=== XRL Demo Server Started ===`);
  console.log(`Listening on http://${serverHost}:${port}`);

  // Log all available network interfaces for easier discovery
  const networkInterfaces = os.networkInterfaces();
  console.log("\nAvailable on the following network addresses:");
  Object.values(networkInterfaces).forEach((interfaces) => {
    interfaces?.forEach((iface) => {
      if (!iface.internal && iface.family === "IPv4") {
        console.log(`  - http://${iface.address}:${port}`);
      }
    });
  });
  console.log(`\nFor local access use: http://localhost:${port}`);

  server.on("error", (err) => {
    logError(`Server error:`, err);
  });

  return { server, port };
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

/**
 * Setup graceful shutdown handlers
 */
export function setupShutdownHandlers(
  server: Server,
  renderer: RenderService
): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo(`\nReceived ${signal} signal. Starting graceful shutdown...`);

    try {
      // Let queued renders finish and close the browser first
      await renderer.close();
      await closeServer(server);
      logInfo("HTTP server closed successfully");
      logInfo("Shutdown completed successfully");
      process.exit(0);
    } catch (error) {
      logError("Error during shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

/**
 * Main server initialization function
 */
export async function initializeServer(
  app: express.Application,
  requestedPort: number,
  serverHost: string,
  renderer: RenderService
): Promise<Server> {
  const { server } = await startServer(app, requestedPort, serverHost);
  setupShutdownHandlers(server, renderer);
  return server;
}
