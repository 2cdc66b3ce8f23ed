import {
  buildFullPageFilename,
  buildImageEntry,
  buildImageFilename,
  createRenderId,
  isSafeImageFilename,
} from "./screenshot.js";

describe("createRenderId", () => {
  it("combines the timestamp with a random suffix", () => {
    expect(createRenderId(1700000000000, () => 0.5)).toBe("1700000000000-i000000");
  });

  it("gives different ids for different random draws", () => {
    const a = createRenderId(1, () => 0.123456789);
    const b = createRenderId(1, () => 0.987654321);
    expect(a).not.toBe(b);
    expect(a).toMatch(/^1-[0-9a-z]{7}$/);
  });
});

describe("image filenames", () => {
  it("names section and full page images after the render id", () => {
    expect(buildImageFilename("r1", "XRL_main", 0)).toBe("r1-XRL_main-0.png");
    expect(buildImageFilename("r1", "XRL_below", 2)).toBe("r1-XRL_below-2.png");
    expect(buildFullPageFilename("r1")).toBe("r1-full_page.png");
  });

  it.each(["full_page.png", "1-abc-XRL_head-0.png", "a.b.c"])(
    "accepts %s",
    (name) => {
      expect(isSafeImageFilename(name)).toBe(true);
    }
  );

  it.each(["../secret.png", ".env", "a/b.png", "a\\b.png", "x..png", ""])(
    "rejects %s",
    (name) => {
      expect(isSafeImageFilename(name)).toBe(false);
    }
  );
});

describe("buildImageEntry", () => {
  it("builds an image url under /images with rounded dimensions", () => {
    expect(
      buildImageEntry("http://localhost:5000", "r1-XRL_main-0.png", {
        x: 0,
        y: 0,
        width: 320.6,
        height: 99.4,
      })
    ).toEqual({
      url: "http://localhost:5000/images/r1-XRL_main-0.png",
      width: 321,
      height: 99,
    });
  });
});
