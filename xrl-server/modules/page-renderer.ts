/**
 * Renders an XRL emulator page in the browser session: screenshots the full
 * page and every XRL section into the images directory and computes the
 * layout (element regions plus remainder).
 */

import fs from "fs/promises";
import path from "path";
import type { ElementHandle, Page } from "puppeteer-core";
import type { BrowserSession } from "./browser-session.js";
import { HttpError, UpstreamError, errorMessage } from "./errors.js";
import { logDebug, logInfo } from "./logger.js";
import {
  clipRect,
  computeRemainder,
  type PaddingBox,
  type Rect,
} from "./remainder.js";
import {
  SECTION_KEYS,
  buildFullPageFilename,
  buildImageEntry,
  buildImageFilename,
  createRenderId,
  type ImageEntry,
  type SectionKey,
} from "./screenshot.js";

/** Every class the XRL framework gives meaning to */
export const XRL_CLASSES = [
  "XRL-main",
  "XRL-head",
  "XRL-below",
  "XRL-right",
  "XRL-left",
  "XRL-ignore",
  "XRL-element",
] as const;

const NESTED_SECTION_SELECTOR = XRL_CLASSES.map((c) => `.${c}`).join(", ");
const CONTAINER_SELECTOR = "body, .XRL-container, .XRL-region";

export interface LayoutElement {
  section: SectionKey;
  index: number;
  rect: Rect;
  image: string;
}

export interface XrlLayout {
  renderId: string;
  page: Rect;
  elements: LayoutElement[];
  remainder: Rect[];
}

export type RenderResult = {
  full_page: ImageEntry;
  layout: XrlLayout;
} & Record<SectionKey, ImageEntry[]>;

export interface CapturedSection {
  section: SectionKey;
  index: number;
  filename: string;
  rect: Rect;
}

export interface RenderMeasurements {
  renderId: string;
  /** Base URL images are served under */
  imageBaseUrl: string;
  page: Rect;
  fullPageFilename: string;
  captures: CapturedSection[];
  paddingBoxes: PaddingBox[];
}

/**
 * Shape the JSON returned by /render from what the browser measured and
 * captured.
 */
export function buildRenderResult(measurements: RenderMeasurements): RenderResult {
  const { renderId, imageBaseUrl, page, captures, paddingBoxes } = measurements;

  const sections: Record<SectionKey, ImageEntry[]> = {
    XRL_head: [],
    XRL_left: [],
    XRL_right: [],
    XRL_main: [],
    XRL_below: [],
  };
  const elements: LayoutElement[] = [];

  for (const capture of captures) {
    const entry = buildImageEntry(imageBaseUrl, capture.filename, capture.rect);
    sections[capture.section].push(entry);

    const rect = clipRect(capture.rect, page);
    if (rect) {
      elements.push({
        section: capture.section,
        index: capture.index,
        rect,
        image: entry.url,
      });
    }
  }

  return {
    full_page: buildImageEntry(
      imageBaseUrl,
      measurements.fullPageFilename,
      page
    ),
    ...sections,
    layout: {
      renderId,
      page,
      elements,
      remainder: computeRemainder(
        page,
        elements.map((element) => element.rect),
        { paddingBoxes }
      ),
    },
  };
}

// ==== In-page functions (serialized and run by the browser) ====

/**
 * Undo emulator sizing limits and force hidden XRL sections, plus their
 * hidden ancestors, to show.
 */
function prepareXrlSections(): void {
  document.body.style.transform = "scale(1)";
  document.body.style.transformOrigin = "0 0";
  document.querySelectorAll<HTMLElement>(".XRL-container").forEach((container) => {
    container.style.maxWidth = "none";
    container.style.maxHeight = "none";
  });

  const isHidden = (el: HTMLElement) =>
    el.offsetWidth === 0 ||
    el.offsetHeight === 0 ||
    window.getComputedStyle(el).visibility === "hidden";

  const toReveal = new Set<HTMLElement>();
  document
    .querySelectorAll<HTMLElement>(".XRL-head, .XRL-left, .XRL-right, .XRL-main, .XRL-below")
    .forEach((element) => {
      if (!isHidden(element)) return;
      toReveal.add(element);
      for (let parent = element.parentElement; parent; parent = parent.parentElement) {
        if (isHidden(parent)) toReveal.add(parent);
      }
    });

  toReveal.forEach((element) => {
    element.style.display = "flex";
    element.style.visibility = "visible";
  });
}

function measureElement(el: Element): Rect {
  const r = el.getBoundingClientRect();
  return {
    x: r.left + window.scrollX,
    y: r.top + window.scrollY,
    width: r.width,
    height: r.height,
  };
}

function measurePaddingBoxes(elements: Element[]): PaddingBox[] {
  const px = (value: string) => parseFloat(value) || 0;
  return elements.map((el) => {
    const r = el.getBoundingClientRect();
    const style = window.getComputedStyle(el);
    const left = px(style.paddingLeft) + px(style.borderLeftWidth);
    const right = px(style.paddingRight) + px(style.borderRightWidth);
    const top = px(style.paddingTop) + px(style.borderTopWidth);
    const bottom = px(style.paddingBottom) + px(style.borderBottomWidth);
    const outer = {
      x: r.left + window.scrollX,
      y: r.top + window.scrollY,
      width: r.width,
      height: r.height,
    };
    return {
      outer,
      inner: {
        x: outer.x + left,
        y: outer.y + top,
        width: Math.max(0, outer.width - left - right),
        height: Math.max(0, outer.height - top - bottom),
      },
    };
  });
}

/**
 * Hide XRL sections nested inside `el` so they are captured on their own,
 * and report the element's box as it will be captured.
 */
function hideNestedSections(el: Element, selector: string): Rect {
  el.querySelectorAll<HTMLElement>(selector).forEach((child) => {
    child.setAttribute("data-xrl-hidden", child.style.cssText);
    child.style.visibility = "hidden";
    child.style.display = "none";
  });
  const r = el.getBoundingClientRect();
  return {
    x: r.left + window.scrollX,
    y: r.top + window.scrollY,
    width: r.width,
    height: r.height,
  };
}

function restoreHiddenSections(): void {
  document.querySelectorAll<HTMLElement>("[data-xrl-hidden]").forEach((child) => {
    child.style.cssText = child.getAttribute("data-xrl-hidden") ?? "";
    child.removeAttribute("data-xrl-hidden");
  });
}

// ==== Browser-driven render ====

export interface RenderPageOptions {
  imagesDir: string;
  imageBaseUrl: string;
  timeoutMs: number;
  renderId?: string;
}

/** One XRL section element in the loaded page. */
export interface SectionHandle {
  /** Hide nested XRL sections and return the box that will be captured */
  isolate(): Promise<Rect>;
  screenshot(): Promise<Uint8Array>;
}

/**
 * The browser operations a render needs. `renderPage` drives them in order:
 * load, prepare, measure, then capture each section between `isolate` and
 * `restoreHidden`.
 */
export interface CaptureTarget {
  load(url: string, timeoutMs: number): Promise<void>;
  prepare(): Promise<void>;
  /** Body box in page coordinates; null when the page has no body */
  measurePage(): Promise<Rect | null>;
  measurePaddingBoxes(): Promise<PaddingBox[]>;
  sections(): Promise<Record<SectionKey, SectionHandle[]>>;
  screenshotPage(): Promise<Uint8Array>;
  restoreHidden(): Promise<void>;
}

function elementSection(handle: ElementHandle<Element>): SectionHandle {
  return {
    isolate: () => handle.evaluate(hideNestedSections, NESTED_SECTION_SELECTOR),
    screenshot: () => handle.screenshot({ type: "png" }),
  };
}

/**
 * Capture target over a puppeteer page.
 */
export function createCaptureTarget(page: Page): CaptureTarget {
  const handles = (selector: string) =>
    page.$$(selector).then((found) => found.map(elementSection));

  return {
    async load(url, timeoutMs) {
      await page.goto(url, { waitUntil: "load", timeout: timeoutMs });
    },
    prepare: () => page.evaluate(prepareXrlSections),
    async measurePage() {
      const body = await page.$("body");
      return body ? body.evaluate(measureElement) : null;
    },
    measurePaddingBoxes: () => page.$$eval(CONTAINER_SELECTOR, measurePaddingBoxes),
    async sections() {
      const mains = await handles(".XRL-main");
      return {
        XRL_head: await handles(".XRL-head"),
        XRL_left: await handles(".XRL-left"),
        XRL_right: await handles(".XRL-right"),
        XRL_main: mains.slice(0, 1),
        XRL_below: [...mains.slice(1), ...(await handles(".XRL-below"))],
      };
    },
    async screenshotPage() {
      const body = await page.$("body");
      if (!body) throw new Error("Page has no body");
      return body.screenshot({ type: "png" });
    },
    restoreHidden: () => page.evaluate(restoreHiddenSections),
  };
}

async function captureSections(
  target: CaptureTarget,
  renderId: string,
  imagesDir: string
): Promise<CapturedSection[]> {
  const sections = await target.sections();
  const captures: CapturedSection[] = [];

  for (const section of SECTION_KEYS) {
    for (const [index, handle] of sections[section].entries()) {
      const rect = await handle.isolate();
      try {
        if (rect.width === 0 || rect.height === 0) {
          logDebug(`[render] ${renderId}: skipping empty ${section}[${index}]`);
          continue;
        }
        const filename = buildImageFilename(renderId, section, index);
        await fs.writeFile(path.join(imagesDir, filename), await handle.screenshot());
        captures.push({ section, index, filename, rect });
      } finally {
        await target.restoreHidden();
      }
    }
  }
  return captures;
}

/**
 * Load `emulatorUrl` in the target and capture it. Browser failures are
 * reported as UpstreamError.
 */
export async function renderPage(
  target: CaptureTarget,
  emulatorUrl: string,
  options: RenderPageOptions
): Promise<RenderResult> {
  const renderId = options.renderId ?? createRenderId();
  logInfo(`[render] ${renderId}: loading ${emulatorUrl}`);

  try {
    await target.load(emulatorUrl, options.timeoutMs);
  } catch (error) {
    throw new UpstreamError(
      `Failed to load ${emulatorUrl}: ${errorMessage(error)}`,
      error
    );
  }

  try {
    await target.prepare();
    await fs.mkdir(options.imagesDir, { recursive: true });

    const pageRect = await target.measurePage();
    if (!pageRect) {
      throw new UpstreamError(`Page at ${emulatorUrl} has no body to render`);
    }
    const paddingBoxes = await target.measurePaddingBoxes();

    const fullPageFilename = buildFullPageFilename(renderId);
    await fs.writeFile(
      path.join(options.imagesDir, fullPageFilename),
      await target.screenshotPage()
    );

    const captures = await captureSections(target, renderId, options.imagesDir);
    logInfo(`[render] ${renderId}: captured ${captures.length} section image(s)`);

    return buildRenderResult({
      renderId,
      imageBaseUrl: options.imageBaseUrl,
      page: pageRect,
      fullPageFilename,
      captures,
      paddingBoxes,
    });
  } catch (error) {
    if (error instanceof HttpError) throw error;
    throw new UpstreamError(
      `Failed to render ${emulatorUrl}: ${errorMessage(error)}`,
      error
    );
  }
}

// ==== Service boundary used by the routes ====

export interface RenderRequest {
  /** Page to render (already normalized) */
  url: string;
  /** Base URL of this server as the browser can reach it */
  baseUrl: string;
}

export interface RenderService {
  render(request: RenderRequest): Promise<RenderResult>;
  close(): Promise<void>;
}

export interface BrowserRenderServiceOptions {
  imagesDir: string;
  timeoutMs: number;
}

/**
 * Renders through the shared browser session by loading this server's own
 * /xrl emulator page for the requested URL.
 */
export class BrowserRenderService implements RenderService {
  constructor(
    private readonly session: BrowserSession<Page>,
    private readonly options: BrowserRenderServiceOptions
  ) {}

  render(request: RenderRequest): Promise<RenderResult> {
    const emulatorUrl = `${request.baseUrl}/xrl?url=${encodeURIComponent(
      request.url
    )}`;

    if (this.session.pending > 0) {
      logDebug(
        `[render] Waiting for browser (${this.session.pending} render(s) ahead)`
      );
    }

    return this.session.use((page) =>
      renderPage(createCaptureTarget(page), emulatorUrl, {
        imagesDir: this.options.imagesDir,
        imageBaseUrl: request.baseUrl,
        timeoutMs: this.options.timeoutMs,
      })
    );
  }

  close(): Promise<void> {
    return this.session.close();
  }
}
