/**
 * Remainder computation for XRL layouts.
 *
 * The remainder is the part of the page that no captured element covers.
 * It is computed by subtracting every element rectangle from the page
 * rectangle, then dropping slivers and regions that only consist of a
 * container's padding.
 *
 * Known gap: blank space made of padding from two nested containers, neither
 * of which covers it alone, is kept.
 */

/** Axis-aligned rectangle in CSS pixels, page coordinates. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * A container's border box (`outer`) and content box (`inner`). The band
 * between the two is padding plus border.
 */
export interface PaddingBox {
  outer: Rect;
  inner: Rect;
}

export interface RemainderOptions {
  paddingBoxes?: PaddingBox[];
  /** Regions thinner than this in either dimension are dropped */
  minRegionSize?: number;
}

export const DEFAULT_MIN_REGION_SIZE = 4;

export function rectRight(r: Rect): number {
  return r.x + r.width;
}

export function rectBottom(r: Rect): number {
  return r.y + r.height;
}

export function isEmptyRect(r: Rect): boolean {
  return r.width <= 0 || r.height <= 0;
}

export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(rectRight(a), rectRight(b));
  const bottom = Math.min(rectBottom(a), rectBottom(b));
  if (right <= x || bottom <= y) return null;
  return { x, y, width: right - x, height: bottom - y };
}

/** True when the rectangles share a positive area. Touching edges do not count. */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return intersectRect(a, b) !== null;
}

export function containsRect(outer: Rect, inner: Rect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    rectRight(inner) <= rectRight(outer) &&
    rectBottom(inner) <= rectBottom(outer)
  );
}

/** Clip `r` to `bounds`; null when nothing is left. */
export function clipRect(r: Rect, bounds: Rect): Rect | null {
  return intersectRect(r, bounds);
}

/**
 * `a` minus `b` as up to four disjoint rectangles: the full-width bands
 * above and below `b`, then the pieces left and right of `b` within its
 * vertical span.
 */
export function subtractRect(a: Rect, b: Rect): Rect[] {
  const hole = intersectRect(a, b);
  if (!hole) return [a];

  const pieces: Rect[] = [
    { x: a.x, y: a.y, width: a.width, height: hole.y - a.y },
    {
      x: a.x,
      y: rectBottom(hole),
      width: a.width,
      height: rectBottom(a) - rectBottom(hole),
    },
    { x: a.x, y: hole.y, width: hole.x - a.x, height: hole.height },
    {
      x: rectRight(hole),
      y: hole.y,
      width: rectRight(a) - rectRight(hole),
      height: hole.height,
    },
  ];

  return pieces.filter((piece) => !isEmptyRect(piece));
}

/**
 * Join rectangles stacked directly on top of each other that share the same
 * horizontal extent.
 */
export function mergeVerticalRuns(rects: Rect[]): Rect[] {
  const sorted = [...rects].sort(
    (a, b) => a.x - b.x || a.width - b.width || a.y - b.y
  );

  const merged: Rect[] = [];
  for (const rect of sorted) {
    const last = merged[merged.length - 1];
    if (
      last &&
      last.x === rect.x &&
      last.width === rect.width &&
      rectBottom(last) === rect.y
    ) {
      merged[merged.length - 1] = { ...last, height: last.height + rect.height };
    } else {
      merged.push({ ...rect });
    }
  }
  return merged;
}

/**
 * A region lying wholly in the band between a container's border box and its
 * content box is blank padding, not uncaptured content.
 */
export function isPaddingOnly(region: Rect, box: PaddingBox): boolean {
  return containsRect(box.outer, region) && !rectsOverlap(region, box.inner);
}

export function sortByPosition(rects: Rect[]): Rect[] {
  return [...rects].sort((a, b) => a.y - b.y || a.x - b.x);
}

/**
 * Page area not covered by any element, minus slivers and padding-only
 * regions. Regions are disjoint, inside `page`, and never overlap an
 * element.
 */
export function computeRemainder(
  page: Rect,
  elements: Rect[],
  options: RemainderOptions = {}
): Rect[] {
  const { paddingBoxes = [], minRegionSize = DEFAULT_MIN_REGION_SIZE } =
    options;

  if (isEmptyRect(page)) return [];

  let regions: Rect[] = [page];
  for (const element of elements) {
    const clipped = clipRect(element, page);
    if (!clipped) continue;
    regions = regions.flatMap((region) => subtractRect(region, clipped));
  }

  const kept = mergeVerticalRuns(regions).filter(
    (region) =>
      region.width >= minRegionSize &&
      region.height >= minRegionSize &&
      !paddingBoxes.some((box) => isPaddingOnly(region, box))
  );

  return sortByPosition(kept);
}
