import fetch from "node-fetch";
import { BadRequestError, UpstreamError } from "./errors.js";
import {
  buildSelfRedirect,
  createPageFetcher,
  normalizeUrl,
  readUrlParam,
} from "./navigation.js";

jest.mock("node-fetch", () => ({
  __esModule: true,
  default: jest.fn(),
}));

const { Response } =
  jest.requireActual<typeof import("node-fetch")>("node-fetch");
const mockedFetch = jest.mocked(fetch);

describe("normalizeUrl", () => {
  it("prefixes http:// when the scheme is missing", () => {
    expect(normalizeUrl("example.com")).toBe("http://example.com/");
    expect(normalizeUrl("  example.com/a?b=1 ")).toBe("http://example.com/a?b=1");
  });

  it("keeps http and https URLs", () => {
    expect(normalizeUrl("https://example.com/page")).toBe("https://example.com/page");
    expect(normalizeUrl("http://localhost:5000/info")).toBe("http://localhost:5000/info");
  });

  it("rejects empty values", () => {
    expect(() => normalizeUrl("   ")).toThrow(BadRequestError);
    expect(() => normalizeUrl("")).toThrow("URL parameter is missing.");
  });

  it("rejects values that do not parse as a URL", () => {
    expect(() => normalizeUrl("http://")).toThrow(BadRequestError);
  });
});

describe("readUrlParam", () => {
  it("normalizes the url parameter", () => {
    expect(readUrlParam({ url: "example.com" })).toBe("http://example.com/");
  });

  it.each([{}, { url: "" }, { url: "  " }, { url: ["a.com", "b.com"] }])(
    "treats %p as missing",
    (query) => {
      expect(() => readUrlParam(query)).toThrow("URL parameter is missing.");
    }
  );
});

describe("buildSelfRedirect", () => {
  it("encodes the final URL into the query", () => {
    expect(buildSelfRedirect("/xrl", "https://example.com/a?b=1&c=2")).toBe(
      "/xrl?url=https%3A%2F%2Fexample.com%2Fa%3Fb%3D1%26c%3D2"
    );
  });
});

describe("createPageFetcher", () => {
  beforeEach(() => {
    mockedFetch.mockReset();
  });

  it("returns the body and the URL after redirects", async () => {
    mockedFetch.mockResolvedValue(
      new Response("<p>hi</p>", { status: 200, url: "https://example.com/final" })
    );

    const page = await createPageFetcher(1000)("https://example.com/start");

    expect(page).toEqual({ finalUrl: "https://example.com/final", html: "<p>hi</p>" });
    expect(mockedFetch).toHaveBeenCalledWith(
      "https://example.com/start",
      expect.objectContaining({ redirect: "follow", timeout: 1000 })
    );
  });

  it("reports upstream error statuses", async () => {
    mockedFetch.mockResolvedValue(new Response("gone", { status: 404 }));

    const error = await createPageFetcher(1000)("https://example.com/").catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toHaveProperty("status", 502);
    expect(error).toHaveProperty(
      "message",
      "Failed to fetch https://example.com/: upstream responded 404"
    );
  });

  it("reports network failures", async () => {
    mockedFetch.mockRejectedValue(new Error("getaddrinfo ENOTFOUND example.invalid"));

    await expect(createPageFetcher(1000)("http://example.invalid/")).rejects.toThrow(
      "Failed to fetch http://example.invalid/: getaddrinfo ENOTFOUND example.invalid"
    );
  });
});
