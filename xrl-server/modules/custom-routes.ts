/**
 * Custom route slots: a fixed number of numbered redirects whose targets can
 * be changed at runtime. Writes are serialized and, when a file is
 * configured, persisted by writing a temp file and renaming it over the old
 * one.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { NotFoundError, isMissingFileError } from "./errors.js";
import { logDebug, logInfo } from "./logger.js";
import { normalizeUrl } from "./navigation.js";
import { SerialQueue } from "./serial-queue.js";

export const DEFAULT_CUSTOM_ROUTES: Readonly<Record<number, string>> = {
  1: "https://www.aalto.fi",
  2: "https://en.wikipedia.org/wiki/Aalto_University",
  3: "https://github.com/aaron-r-campbell",
};

export interface CustomRoute {
  slot: number;
  url: string;
}

export interface CustomRouteStoreOptions {
  slotCount?: number;
  /** Initial targets by slot; slots without one stay unset */
  initial?: Readonly<Record<number, string>>;
  /** JSON file backing the slots */
  filePath?: string;
}

const routesFileSchema = z.record(z.string().regex(/^\d+$/), z.string().min(1));

export class CustomRouteStore {
  readonly slotCount: number;
  private readonly routes = new Map<number, string>();
  private readonly filePath?: string;
  private readonly writes = new SerialQueue();

  constructor(options: CustomRouteStoreOptions = {}) {
    this.slotCount = options.slotCount ?? 3;
    this.filePath = options.filePath;

    const initial = options.initial ?? DEFAULT_CUSTOM_ROUTES;
    for (const [key, url] of Object.entries(initial)) {
      const slot = Number(key);
      if (this.isValidSlot(slot)) {
        this.routes.set(slot, url);
      }
    }
  }

  /**
   * Create a store, overlaying the slots saved in `filePath` when the file
   * exists.
   */
  static async load(
    options: CustomRouteStoreOptions = {}
  ): Promise<CustomRouteStore> {
    const store = new CustomRouteStore(options);
    if (!options.filePath) return store;

    let raw: string;
    try {
      raw = await fs.readFile(options.filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        logInfo(
          `[routes] No saved custom routes at ${options.filePath}, using defaults`
        );
        return store;
      }
      throw error;
    }

    const saved = routesFileSchema.parse(JSON.parse(raw));
    for (const [key, url] of Object.entries(saved)) {
      const slot = Number(key);
      if (store.isValidSlot(slot)) {
        store.routes.set(slot, url);
      } else {
        logDebug(`[routes] Ignoring saved slot ${slot} outside 1-${store.slotCount}`);
      }
    }
    logInfo(`[routes] Loaded custom routes from ${options.filePath}`);
    return store;
  }

  isValidSlot(slot: number): boolean {
    return Number.isInteger(slot) && slot >= 1 && slot <= this.slotCount;
  }

  /** Target URL for a slot. */
  resolve(slot: number): string {
    this.assertSlot(slot);
    const url = this.routes.get(slot);
    if (url === undefined) {
      throw new NotFoundError(`Custom route ${slot} is not configured`);
    }
    return url;
  }

  /**
   * Point a slot at a new URL. Resolves with the normalized URL once the
   * change is applied (and saved, when file-backed).
   */
  async update(slot: number, rawUrl: string): Promise<string> {
    this.assertSlot(slot);
    const url = normalizeUrl(rawUrl);

    return this.writes.run(async () => {
      const next = new Map(this.routes).set(slot, url);
      await this.persist(next);
      this.routes.set(slot, url);
      logInfo(`[routes] Custom route ${slot} -> ${url}`);
      return url;
    });
  }

  list(): CustomRoute[] {
    return this.toList(this.routes);
  }

  private assertSlot(slot: number): void {
    if (!this.isValidSlot(slot)) {
      throw new NotFoundError(
        `Custom route ${slot} does not exist (valid slots: 1-${this.slotCount})`
      );
    }
  }

  private toList(routes: ReadonlyMap<number, string>): CustomRoute[] {
    const result: CustomRoute[] = [];
    for (let slot = 1; slot <= this.slotCount; slot++) {
      const url = routes.get(slot);
      if (url !== undefined) result.push({ slot, url });
    }
    return result;
  }

  private async persist(routes: ReadonlyMap<number, string>): Promise<void> {
    if (!this.filePath) return;

    const data: Record<string, string> = {};
    for (const { slot, url } of this.toList(routes)) {
      data[String(slot)] = url;
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2) + "\n", "utf8");
    await fs.rename(tempPath, this.filePath);
  }
}
