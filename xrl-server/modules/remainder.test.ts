import {
  computeRemainder,
  intersectRect,
  isPaddingOnly,
  mergeVerticalRuns,
  rectsOverlap,
  subtractRect,
  type Rect,
} from "./remainder.js";

const page: Rect = { x: 0, y: 0, width: 100, height: 100 };

function area(rects: Rect[]): number {
  return rects.reduce((sum, r) => sum + r.width * r.height, 0);
}

describe("intersectRect", () => {
  it("returns the shared area", () => {
    expect(
      intersectRect({ x: 0, y: 0, width: 10, height: 10 }, { x: 5, y: 5, width: 10, height: 10 })
    ).toEqual({ x: 5, y: 5, width: 5, height: 5 });
  });

  it("treats touching edges as no overlap", () => {
    const a = { x: 0, y: 0, width: 10, height: 10 };
    const b = { x: 10, y: 0, width: 10, height: 10 };
    expect(intersectRect(a, b)).toBeNull();
    expect(rectsOverlap(a, b)).toBe(false);
  });
});

describe("subtractRect", () => {
  it("splits into bands above and below, then pieces beside the hole", () => {
    expect(subtractRect(page, { x: 10, y: 10, width: 80, height: 30 })).toEqual([
      { x: 0, y: 0, width: 100, height: 10 },
      { x: 0, y: 40, width: 100, height: 60 },
      { x: 0, y: 10, width: 10, height: 30 },
      { x: 90, y: 10, width: 10, height: 30 },
    ]);
  });

  it("returns the rectangle unchanged when nothing overlaps", () => {
    expect(subtractRect(page, { x: 200, y: 0, width: 10, height: 10 })).toEqual([page]);
  });

  it("returns nothing when the hole covers the rectangle", () => {
    expect(subtractRect(page, { x: -5, y: -5, width: 200, height: 200 })).toEqual([]);
  });
});

describe("mergeVerticalRuns", () => {
  it("joins stacked rectangles with the same horizontal extent", () => {
    expect(
      mergeVerticalRuns([
        { x: 50, y: 50, width: 50, height: 50 },
        { x: 50, y: 0, width: 50, height: 50 },
      ])
    ).toEqual([{ x: 50, y: 0, width: 50, height: 100 }]);
  });

  it("keeps rectangles with a gap between them apart", () => {
    expect(
      mergeVerticalRuns([
        { x: 0, y: 0, width: 10, height: 10 },
        { x: 0, y: 20, width: 10, height: 10 },
      ])
    ).toHaveLength(2);
  });
});

describe("isPaddingOnly", () => {
  const box = {
    outer: { x: 0, y: 0, width: 100, height: 100 },
    inner: { x: 8, y: 8, width: 84, height: 84 },
  };

  it("accepts a region inside the padding band", () => {
    expect(isPaddingOnly({ x: 0, y: 0, width: 100, height: 8 }, box)).toBe(true);
  });

  it("rejects a region reaching into the content box", () => {
    expect(isPaddingOnly({ x: 0, y: 0, width: 100, height: 20 }, box)).toBe(false);
  });
});

describe("computeRemainder", () => {
  it("returns the uncovered regions sorted top to bottom, left to right", () => {
    expect(computeRemainder(page, [{ x: 10, y: 10, width: 80, height: 30 }])).toEqual([
      { x: 0, y: 0, width: 100, height: 10 },
      { x: 0, y: 10, width: 10, height: 30 },
      { x: 90, y: 10, width: 10, height: 30 },
      { x: 0, y: 40, width: 100, height: 60 },
    ]);
  });

  it("returns the whole page when there are no elements", () => {
    expect(computeRemainder(page, [])).toEqual([page]);
  });

  it("returns nothing for an empty page", () => {
    expect(computeRemainder({ x: 0, y: 0, width: 0, height: 100 }, [])).toEqual([]);
  });

  it("ignores elements outside the page", () => {
    expect(computeRemainder(page, [{ x: 150, y: 150, width: 20, height: 20 }])).toEqual([page]);
  });

  it("returns the gap between two columns", () => {
    expect(
      computeRemainder(page, [
        { x: 0, y: 0, width: 40, height: 100 },
        { x: 60, y: 0, width: 40, height: 100 },
      ])
    ).toEqual([{ x: 40, y: 0, width: 20, height: 100 }]);
  });

  it("merges pieces left by stacked elements", () => {
    expect(
      computeRemainder(page, [
        { x: 0, y: 0, width: 50, height: 50 },
        { x: 0, y: 50, width: 50, height: 50 },
      ])
    ).toEqual([{ x: 50, y: 0, width: 50, height: 100 }]);
  });

  it("drops slivers below the minimum size", () => {
    expect(computeRemainder(page, [{ x: 0, y: 0, width: 100, height: 98 }])).toEqual([]);
    expect(
      computeRemainder(page, [{ x: 0, y: 0, width: 100, height: 98 }], { minRegionSize: 2 })
    ).toEqual([{ x: 0, y: 98, width: 100, height: 2 }]);
  });

  it("drops regions made only of container padding", () => {
    const paddingBoxes = [
      {
        outer: { x: 0, y: 0, width: 100, height: 100 },
        inner: { x: 8, y: 8, width: 84, height: 84 },
      },
    ];
    const content = { x: 8, y: 8, width: 84, height: 84 };

    expect(computeRemainder(page, [content])).toHaveLength(4);
    expect(computeRemainder(page, [content], { paddingBoxes })).toEqual([]);
  });

  it("keeps content regions inside a padded container", () => {
    const paddingBoxes = [
      {
        outer: { x: 0, y: 0, width: 100, height: 100 },
        inner: { x: 8, y: 8, width: 84, height: 84 },
      },
    ];
    expect(
      computeRemainder(page, [{ x: 8, y: 8, width: 84, height: 40 }], { paddingBoxes })
    ).toEqual([{ x: 0, y: 48, width: 100, height: 52 }]);
  });

  it("never overlaps an element and stays inside the page", () => {
    const elements: Rect[] = [
      { x: 5, y: 5, width: 30, height: 20 },
      { x: 20, y: 15, width: 40, height: 40 },
      { x: 70, y: -10, width: 50, height: 30 },
      { x: 0, y: 80, width: 100, height: 10 },
    ];
    const remainder = computeRemainder(page, elements, { minRegionSize: 0 });

    for (const region of remainder) {
      expect(intersectRect(region, page)).toEqual(region);
      for (const element of elements) {
        expect(rectsOverlap(region, element)).toBe(false);
      }
    }
    for (let i = 0; i < remainder.length; i++) {
      for (let j = i + 1; j < remainder.length; j++) {
        expect(rectsOverlap(remainder[i], remainder[j])).toBe(false);
      }
    }
  });

  it("covers exactly the page area left by disjoint elements", () => {
    const elements: Rect[] = [
      { x: 0, y: 0, width: 30, height: 30 },
      { x: 50, y: 50, width: 20, height: 20 },
    ];
    const remainder = computeRemainder(page, elements, { minRegionSize: 0 });
    expect(area(remainder)).toBe(100 * 100 - 900 - 400);
  });
});
