/**
 * Shared configuration and server utilities.
 *
 * Values come from the environment (populated from .env by dotenv in the
 * entry point) and are validated into a typed ServerConfig.
 */

import net from "net";
import path from "path";
import { z } from "zod";

// Get configuration value with fallback priority:
// 1. Environment variable (empty strings count as unset)
// 2. Default value
export function getConfigValue(
  key: string,
  defaultValue?: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[key];
  if (value !== undefined && value.trim() !== "") {
    return value.trim();
  }
  return defaultValue;
}

const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(5000),
  serverHost: z.string().default("0.0.0.0"),
  imagesDir: z.string().default("images"),
  examplesDir: z.string().default("examples"),
  browserExecutablePath: z.string().optional(),
  windowWidth: z.coerce.number().int().positive().default(2000),
  windowHeight: z.coerce.number().int().positive().default(6000),
  browserTimeoutMs: z.coerce.number().int().positive().default(30000),
  fetchTimeoutMs: z.coerce.number().int().positive().default(15000),
  customRoutesFile: z.string().optional(),
  customRouteSlots: z.coerce.number().int().min(1).max(99).default(3),
  publicBaseUrl: z
    .string()
    .url()
    .transform((value) => value.replace(/\/+$/, ""))
    .optional(),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

/**
 * Read and validate the server configuration. Relative directories are
 * resolved against the current working directory.
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ServerConfig {
  const read = (key: string) => getConfigValue(key, undefined, env);

  const parsed = serverConfigSchema.safeParse({
    port: read("PORT"),
    serverHost: read("SERVER_HOST"),
    imagesDir: read("IMAGES_DIR"),
    examplesDir: read("EXAMPLES_DIR"),
    browserExecutablePath: read("BROWSER_EXECUTABLE_PATH"),
    windowWidth: read("BROWSER_WINDOW_WIDTH"),
    windowHeight: read("BROWSER_WINDOW_HEIGHT"),
    browserTimeoutMs: read("BROWSER_TIMEOUT"),
    fetchTimeoutMs: read("FETCH_TIMEOUT"),
    customRoutesFile: read("CUSTOM_ROUTES_FILE"),
    customRouteSlots: read("CUSTOM_ROUTE_SLOTS"),
    publicBaseUrl: read("PUBLIC_BASE_URL"),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid server configuration: ${details}`);
  }

  const config = parsed.data;
  return {
    ...config,
    imagesDir: path.resolve(cwd, config.imagesDir),
    examplesDir: path.resolve(cwd, config.examplesDir),
    customRoutesFile: config.customRoutesFile
      ? path.resolve(cwd, config.customRoutesFile)
      : undefined,
  };
}

// ==== Port discovery ====

/**
 * Check if a port is available
 */
export function isPortAvailable(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();

    server.once("error", () => {
      resolve(false);
    });

    server.listen(port, () => {
      server.once("close", () => {
        resolve(true);
      });
      server.close();
    });
  });
}

/**
 * Find an available port starting from the requested port
 */
export async function getAvailablePort(
  requestedPort: number,
  maxAttempts = 10
): Promise<number> {
  for (let i = 0; i < maxAttempts; i++) {
    const portToTry = requestedPort + i;
    if (await isPortAvailable(portToTry)) {
      return portToTry;
    }
  }

  throw new Error(
    `No available port found in range ${requestedPort}-${
      requestedPort + maxAttempts - 1
    }`
  );
}
