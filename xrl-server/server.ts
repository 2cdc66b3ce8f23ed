#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

// Install global colored logger (subtle)
import { installGlobalLogger, logError, logInfo } from "./modules/logger.js";
installGlobalLogger();

import fs from "fs/promises";
import { createChromeSession } from "./modules/browser-session.js";
import { CustomRouteStore } from "./modules/custom-routes.js";
import { createPageFetcher } from "./modules/navigation.js";
import { BrowserRenderService } from "./modules/page-renderer.js";
import { initializeServer } from "./modules/server-lifecycle.js";
import { loadServerConfig } from "./modules/shared.js";
import { createApp } from "./xrl-connector.js";

async function main(): Promise<void> {
  const config = loadServerConfig();

  await fs.mkdir(config.imagesDir, { recursive: true });
  logInfo(`Images directory: ${config.imagesDir}`);
  logInfo(`Examples directory: ${config.examplesDir}`);

  const routes = await CustomRouteStore.load({
    slotCount: config.customRouteSlots,
    filePath: config.customRoutesFile,
  });

  const renderer = new BrowserRenderService(
    createChromeSession({
      executablePath: config.browserExecutablePath,
      windowWidth: config.windowWidth,
      windowHeight: config.windowHeight,
    }),
    { imagesDir: config.imagesDir, timeoutMs: config.browserTimeoutMs }
  );

  const app = createApp({
    examplesDir: config.examplesDir,
    imagesDir: config.imagesDir,
    routes,
    renderer,
    fetchPage: createPageFetcher(config.fetchTimeoutMs),
    publicBaseUrl: config.publicBaseUrl,
  });

  await initializeServer(app, config.port, config.serverHost, renderer);
}

main().catch((err) => {
  logError("Failed to start server:", err);
  process.exit(1);
});
