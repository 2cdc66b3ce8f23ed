import fs from "fs/promises";
import os from "os";
import path from "path";
import { CustomRouteStore, DEFAULT_CUSTOM_ROUTES } from "./custom-routes.js";
import { BadRequestError, NotFoundError } from "./errors.js";

describe("CustomRouteStore", () => {
  let tmpDir: string;

  beforeAll(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "xrl-routes-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("starts with the default targets", () => {
    const store = new CustomRouteStore();
    expect(store.resolve(1)).toBe(DEFAULT_CUSTOM_ROUTES[1]);
    expect(store.list().map(({ slot }) => slot)).toEqual([1, 2, 3]);
  });

  it("resolves an updated slot to the normalized URL", async () => {
    const store = new CustomRouteStore();
    await expect(store.update(2, "example.com/page")).resolves.toBe(
      "http://example.com/page"
    );
    expect(store.resolve(2)).toBe("http://example.com/page");
    expect(store.resolve(1)).toBe(DEFAULT_CUSTOM_ROUTES[1]);
  });

  it.each([0, 4, -1, 1.5])("rejects slot %p", async (slot) => {
    const store = new CustomRouteStore();
    expect(() => store.resolve(slot)).toThrow(NotFoundError);
    await expect(store.update(slot, "example.com")).rejects.toThrow(
      `Custom route ${slot} does not exist (valid slots: 1-3)`
    );
  });

  it("rejects an empty URL without changing the slot", async () => {
    const store = new CustomRouteStore();
    await expect(store.update(1, " ")).rejects.toThrow(BadRequestError);
    expect(store.resolve(1)).toBe(DEFAULT_CUSTOM_ROUTES[1]);
  });

  it("reports slots without a target", () => {
    const store = new CustomRouteStore({ slotCount: 5 });
    expect(() => store.resolve(5)).toThrow("Custom route 5 is not configured");
    expect(store.list()).toHaveLength(3);
  });

  it("applies concurrent updates in call order", async () => {
    const store = new CustomRouteStore({
      filePath: path.join(tmpDir, "routes.json"),
    });

    await Promise.all([
      store.update(1, "https://a.example/"),
      store.update(1, "https://b.example/"),
      store.update(3, "https://c.example/"),
    ]);

    expect(store.resolve(1)).toBe("https://b.example/");
    const saved: unknown = JSON.parse(
      await fs.readFile(path.join(tmpDir, "routes.json"), "utf8")
    );
    expect(saved).toEqual({
      "1": "https://b.example/",
      "2": DEFAULT_CUSTOM_ROUTES[2],
      "3": "https://c.example/",
    });
  });

  it("loads saved slots over the defaults", async () => {
    const filePath = path.join(tmpDir, "nested", "routes.json");
    const first = new CustomRouteStore({ filePath });
    await first.update(3, "https://saved.example/");

    const second = await CustomRouteStore.load({ filePath });
    expect(second.resolve(3)).toBe("https://saved.example/");
    expect(second.resolve(1)).toBe(DEFAULT_CUSTOM_ROUTES[1]);
  });

  it("ignores saved slots outside the configured range", async () => {
    const filePath = path.join(tmpDir, "routes.json");
    await fs.writeFile(
      filePath,
      JSON.stringify({ "1": "https://one.example/", "9": "https://nine.example/" })
    );

    const store = await CustomRouteStore.load({ filePath });
    expect(store.list()).toEqual([
      { slot: 1, url: "https://one.example/" },
      { slot: 2, url: DEFAULT_CUSTOM_ROUTES[2] },
      { slot: 3, url: DEFAULT_CUSTOM_ROUTES[3] },
    ]);
  });

  it("keeps the defaults when the file does not exist", async () => {
    const store = await CustomRouteStore.load({
      filePath: path.join(tmpDir, "missing.json"),
    });
    expect(store.list()).toEqual([
      { slot: 1, url: DEFAULT_CUSTOM_ROUTES[1] },
      { slot: 2, url: DEFAULT_CUSTOM_ROUTES[2] },
      { slot: 3, url: DEFAULT_CUSTOM_ROUTES[3] },
    ]);
  });
});
