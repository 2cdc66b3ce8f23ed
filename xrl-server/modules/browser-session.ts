/**
 * Single headless browser shared by all render requests.
 *
 * The browser is launched on first use and handed out through `use()`,
 * which opens a fresh page, runs the callback and closes the page again.
 * Uses run one at a time in arrival order.
 */

import puppeteer, { type Browser, type Page } from "puppeteer-core";
import { UpstreamError, errorMessage } from "./errors.js";
import { logDebug, logError, logInfo, logWarn } from "./logger.js";
import { SerialQueue } from "./serial-queue.js";

export interface Viewport {
  width: number;
  height: number;
}

/** The parts of a browser page the session itself manages. */
export interface ManagedPage {
  setViewport(viewport: Viewport): Promise<void>;
  close(): Promise<void>;
}

export interface ManagedBrowser<P extends ManagedPage> {
  /** False once the browser process has exited or the connection dropped */
  readonly connected: boolean;
  newPage(): Promise<P>;
  close(): Promise<void>;
}

export type BrowserLauncher<P extends ManagedPage> = () => Promise<
  ManagedBrowser<P>
>;

export interface ChromeSessionOptions {
  executablePath?: string;
  windowWidth: number;
  windowHeight: number;
}

export class BrowserSession<P extends ManagedPage> {
  private browser: ManagedBrowser<P> | null = null;
  private readonly queue = new SerialQueue();
  private closed = false;

  constructor(
    private readonly launcher: BrowserLauncher<P>,
    private readonly viewport: Viewport
  ) {}

  /** Number of uses running or waiting for the browser. */
  get pending(): number {
    return this.queue.pending;
  }

  use<T>(fn: (page: P) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      if (this.closed) {
        throw new Error("Browser session is closed");
      }

      const page = await this.openPage(await this.getBrowser());
      try {
        return await fn(page);
      } finally {
        await page.close().catch((err: unknown) => {
          logError("[render] Error closing page:", errorMessage(err));
        });
      }
    });
  }

  /** Wait for queued uses to settle, then close the browser. */
  async close(): Promise<void> {
    this.closed = true;
    await this.queue.idle();
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      if (browser.connected) {
        await browser.close();
      }
      logInfo("[render] Browser closed");
    }
  }

  private async openPage(browser: ManagedBrowser<P>): Promise<P> {
    let page: P;
    try {
      page = await browser.newPage();
    } catch (error) {
      this.dropIfDisconnected(browser);
      throw new UpstreamError(
        `Failed to open browser page: ${errorMessage(error)}`,
        error
      );
    }

    try {
      await page.setViewport(this.viewport);
    } catch (error) {
      await page.close().catch((err: unknown) => {
        logError("[render] Error closing page:", errorMessage(err));
      });
      this.dropIfDisconnected(browser);
      throw new UpstreamError(
        `Failed to set browser viewport: ${errorMessage(error)}`,
        error
      );
    }
    return page;
  }

  private dropIfDisconnected(browser: ManagedBrowser<P>): void {
    if (this.browser === browser && !browser.connected) {
      logWarn("[render] Browser disconnected, relaunching on next use");
      this.browser = null;
    }
  }

  private async getBrowser(): Promise<ManagedBrowser<P>> {
    if (this.browser) {
      this.dropIfDisconnected(this.browser);
    }
    if (!this.browser) {
      logDebug("[render] Launching browser...");
      try {
        this.browser = await this.launcher();
      } catch (error) {
        throw new UpstreamError(
          `Failed to launch browser: ${errorMessage(error)}`,
          error
        );
      }
      logInfo("[render] Browser launched");
    }
    return this.browser;
  }
}

/**
 * Session driving a local Chrome/Chromium through puppeteer-core.
 */
export function createChromeSession(
  options: ChromeSessionOptions
): BrowserSession<Page> {
  const launcher = (): Promise<Browser> =>
    puppeteer.launch({
      headless: true,
      // puppeteer-core ships no browser: use the configured binary or the
      // locally installed stable Chrome
      ...(options.executablePath
        ? { executablePath: options.executablePath }
        : { channel: "chrome" as const }),
      defaultViewport: null,
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        `--window-size=${options.windowWidth},${options.windowHeight}`,
      ],
    });

  return new BrowserSession<Page>(launcher, {
    width: options.windowWidth,
    height: options.windowHeight,
  });
}
