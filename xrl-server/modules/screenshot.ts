/**
 * Image naming and response shaping for rendered XRL sections.
 * Every render gets its own id, so repeated or concurrent renders of the same
 * page never overwrite each other's files.
 */

import type { Rect } from "./remainder.js";

export const SECTION_KEYS = [
  "XRL_head",
  "XRL_left",
  "XRL_right",
  "XRL_main",
  "XRL_below",
] as const;

export type SectionKey = (typeof SECTION_KEYS)[number];

export interface ImageEntry {
  url: string;
  width: number;
  height: number;
}

const SAFE_FILENAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export function createRenderId(
  now: number = Date.now(),
  random: () => number = Math.random
): string {
  return `${now}-${random().toString(36).slice(2, 9).padEnd(7, "0")}`;
}

export function buildImageFilename(
  renderId: string,
  section: SectionKey,
  index: number
): string {
  return `${renderId}-${section}-${index}.png`;
}

export function buildFullPageFilename(renderId: string): string {
  return `${renderId}-full_page.png`;
}

/**
 * Image file names served from the images directory are plain names: no
 * separators, no leading dot.
 */
export function isSafeImageFilename(filename: string): boolean {
  return SAFE_FILENAME.test(filename) && !filename.includes("..");
}

export function buildImageEntry(
  baseUrl: string,
  filename: string,
  rect: Rect
): ImageEntry {
  return {
    url: `${baseUrl}/images/${encodeURIComponent(filename)}`,
    width: Math.round(rect.width),
    height: Math.round(rect.height),
  };
}
