import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import type { Browser, Page } from "puppeteer-core";
import { DEFAULT_CONFIG } from "./config.js";
import { CookieJar } from "./cookies.js";
import { createFetcher, RenderedFetcher } from "./fetcher.js";
import { StaticFetcher } from "./http.js";

vi.mock("./browser.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("./browser.js")>()),
  launchBrowser: vi.fn(),
  createPage: vi.fn(),
}));

import { createPage, launchBrowser } from "./browser.js";

function createMockPage() {
  return {
    setExtraHTTPHeaders: vi.fn().mockResolvedValue(undefined),
    goto: vi.fn().mockResolvedValue(null),
    waitForNetworkIdle: vi.fn().mockResolvedValue(undefined),
    evaluate: vi.fn().mockResolvedValue(0),
    content: vi.fn().mockResolvedValue("<html>rendered</html>"),
    cookies: vi.fn().mockResolvedValue([
      { name: "cf_clearance", value: "token", domain: ".example.com", path: "/", expires: -1, secure: true },
    ]),
    url: vi.fn().mockReturnValue("https://example.com/manhwa/x/chapter-1/"),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe("createFetcher", () => {
  it("returns the static fetcher unless rendering is enabled", () => {
    const fetcher = createFetcher(DEFAULT_CONFIG);
    expect(fetcher).toBeInstanceOf(StaticFetcher);
    expect(fetcher.rendering).toBe(false);
  });

  it("wraps the static fetcher when rendering is enabled", () => {
    const fetcher = createFetcher({ ...DEFAULT_CONFIG, render: true });
    expect(fetcher).toBeInstanceOf(RenderedFetcher);
    expect(fetcher.rendering).toBe(true);
  });
});

describe("RenderedFetcher", () => {
  let jar: CookieJar;
  let fallback: StaticFetcher;
  let mockPage: ReturnType<typeof createMockPage>;
  let mockBrowser: { close: ReturnType<typeof vi.fn> };
  let mockWarn: MockInstance<typeof console.warn>;

  const staticPage = { url: "https://example.com/manhwa/x/chapter-1/", html: "<html>static</html>", cookies: [] };

  const createRenderedFetcher = (interactions = false) =>
    new RenderedFetcher({ chromePath: null, renderWait: 0, interactions, timeout: 1000 }, fallback, jar);

  beforeEach(() => {
    vi.clearAllMocks();
    jar = new CookieJar();
    fallback = new StaticFetcher({ timeout: 1000, jar });
    vi.spyOn(fallback, "fetchPage").mockResolvedValue(staticPage);
    mockPage = createMockPage();
    mockBrowser = { close: vi.fn().mockResolvedValue(undefined) };
    vi.mocked(launchBrowser).mockResolvedValue(mockBrowser as unknown as Browser);
    vi.mocked(createPage).mockResolvedValue(mockPage as unknown as Page);
    mockWarn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    mockWarn.mockRestore();
  });

  it("renders the page and syncs its cookies into the jar", async () => {
    const fetcher = createRenderedFetcher();

    const page = await fetcher.fetchPage("https://example.com/manhwa/x/chapter-1/", "https://example.com/manhwa/x/");

    expect(page).toEqual({
      url: "https://example.com/manhwa/x/chapter-1/",
      html: "<html>rendered</html>",
      cookies: [{ name: "cf_clearance", value: "token", domain: ".example.com", path: "/" }],
    });
    expect(mockPage.setExtraHTTPHeaders).toHaveBeenCalledWith({ Referer: "https://example.com/manhwa/x/" });
    expect(mockPage.goto).toHaveBeenCalledWith("https://example.com/manhwa/x/chapter-1/", {
      waitUntil: "domcontentloaded",
      timeout: 1000,
    });
    expect(mockPage.close).toHaveBeenCalledTimes(1);
    expect(jar.headerFor("https://cdn.example.com/1.jpg")).toBe("cf_clearance=token");
    expect(fallback.fetchPage).not.toHaveBeenCalled();
  });

  it("launches the browser once for several pages", async () => {
    const fetcher = createRenderedFetcher();

    await fetcher.fetchPage("https://example.com/a/");
    await fetcher.fetchPage("https://example.com/b/");

    expect(launchBrowser).toHaveBeenCalledTimes(1);
    expect(launchBrowser).toHaveBeenCalledWith(null);
  });

  it("continues when the network never goes idle", async () => {
    mockPage.waitForNetworkIdle.mockRejectedValueOnce(new Error("Timed out"));
    const page = await createRenderedFetcher().fetchPage("https://example.com/a/");
    expect(page?.html).toBe("<html>rendered</html>");
  });

  it("clicks load-more controls and scrolls when interactions are enabled", async () => {
    vi.useFakeTimers();
    const fetcher = createRenderedFetcher(true);

    const pending = fetcher.fetchPage("https://example.com/a/");
    await vi.runAllTimersAsync();
    await pending;

    // One load-more pass plus five scroll passes
    expect(mockPage.evaluate).toHaveBeenCalledTimes(6);
  });

  it("clicks at most three matching load-more controls", async () => {
    vi.useFakeTimers();
    const control = (text: string) => ({ textContent: text, click: vi.fn() });
    const controls = [control("Load more"), control("Share"), control("Show more"), control("Expand"), control("load more")];
    vi.stubGlobal("document", { querySelectorAll: () => controls });
    mockPage.evaluate.mockImplementationOnce(
      async (reveal: (pattern: string, maxClicks: number) => number, pattern: string, maxClicks: number) =>
        reveal(pattern, maxClicks),
    );

    const pending = createRenderedFetcher(true).fetchPage("https://example.com/a/");
    await vi.runAllTimersAsync();
    await pending;

    expect(controls.map((c) => c.click.mock.calls.length)).toEqual([1, 0, 1, 1, 0]);
  });

  it("falls back to a static fetch when navigation fails", async () => {
    mockPage.goto.mockRejectedValueOnce(new Error("net::ERR_ABORTED"));
    const fetcher = createRenderedFetcher();

    const page = await fetcher.fetchPage("https://example.com/a/", "https://example.com/");

    expect(page).toBe(staticPage);
    expect(fallback.fetchPage).toHaveBeenCalledWith("https://example.com/a/", "https://example.com/");
    expect(mockPage.close).toHaveBeenCalledTimes(1);
    expect(mockWarn).toHaveBeenCalledWith(
      "Rendering failed for https://example.com/a/, falling back to plain request: net::ERR_ABORTED",
    );
    expect(fetcher.rendering).toBe(true);
  });

  it("disables rendering for the rest of the run when the browser cannot launch", async () => {
    vi.mocked(launchBrowser).mockRejectedValueOnce(new Error("Chrome not found"));
    const fetcher = createRenderedFetcher();

    await expect(fetcher.fetchPage("https://example.com/a/")).resolves.toBe(staticPage);
    await expect(fetcher.fetchPage("https://example.com/b/")).resolves.toBe(staticPage);

    expect(fetcher.rendering).toBe(false);
    expect(launchBrowser).toHaveBeenCalledTimes(1);
    expect(mockWarn).toHaveBeenCalledWith("Failed to launch browser, continuing with plain requests: Chrome not found");
  });

  const imageResponse = (bytes: Buffer, contentType = "image/webp") => ({
    ok: () => true,
    headers: () => ({ "content-type": contentType }),
    buffer: vi.fn().mockResolvedValue(bytes),
  });

  it("downloads assets through the browser session", async () => {
    const bytes = Buffer.from("img");
    mockPage.goto.mockResolvedValueOnce(imageResponse(bytes));
    vi.spyOn(fallback, "fetchAsset").mockResolvedValue(null);

    const result = await createRenderedFetcher().fetchAsset("https://cdn.example.com/1.webp", {
      Referer: "https://example.com/manhwa/x/chapter-1/",
    });

    expect(result).toBe(bytes);
    expect(mockPage.goto).toHaveBeenCalledWith("https://cdn.example.com/1.webp", {
      referer: "https://example.com/manhwa/x/chapter-1/",
      timeout: 1000,
    });
    expect(mockPage.close).toHaveBeenCalledTimes(1);
    expect(fallback.fetchAsset).not.toHaveBeenCalled();
  });

  it("falls back to a plain asset request when the browser gets no image", async () => {
    const bytes = Buffer.from("static");
    vi.spyOn(fallback, "fetchAsset").mockResolvedValue(bytes);
    const fetcher = createRenderedFetcher();

    mockPage.goto.mockResolvedValueOnce(imageResponse(Buffer.from("<html>"), "text/html"));
    await expect(fetcher.fetchAsset("https://cdn.example.com/1.jpg", {})).resolves.toBe(bytes);

    mockPage.goto.mockRejectedValueOnce(new Error("net::ERR_FAILED"));
    await expect(fetcher.fetchAsset("https://cdn.example.com/2.jpg", {})).resolves.toBe(bytes);

    expect(fallback.fetchAsset).toHaveBeenCalledTimes(2);
    expect(mockWarn).toHaveBeenCalledWith(
      "Browser request failed for https://cdn.example.com/2.jpg, falling back to plain request: net::ERR_FAILED",
    );
  });

  it("uses plain asset requests once the browser failed to launch", async () => {
    vi.mocked(launchBrowser).mockRejectedValueOnce(new Error("Chrome not found"));
    const bytes = Buffer.from("static");
    vi.spyOn(fallback, "fetchAsset").mockResolvedValue(bytes);

    await expect(createRenderedFetcher().fetchAsset("https://cdn.example.com/1.jpg", {})).resolves.toBe(bytes);
    expect(createPage).not.toHaveBeenCalled();
  });

  it("keeps at most two session pages open for assets", async () => {
    let open = 0;
    let peak = 0;
    mockPage.goto.mockImplementation(async () => {
      open++;
      peak = Math.max(peak, open);
      await new Promise((resolve) => setTimeout(resolve, 5));
      open--;
      return imageResponse(Buffer.from("img"));
    });
    const fetcher = createRenderedFetcher();

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) => fetcher.fetchAsset(`https://cdn.example.com/${n}.jpg`, {})),
    );

    expect(results.every((bytes) => bytes?.toString() === "img")).toBe(true);
    expect(peak).toBe(2);
    expect(createPage).toHaveBeenCalledTimes(5);
  });

  it("probes with plain requests", async () => {
    vi.spyOn(fallback, "probe").mockResolvedValue(true);

    await expect(createRenderedFetcher().probe("https://cdn.example.com/1.jpg", {})).resolves.toBe(true);
    expect(launchBrowser).not.toHaveBeenCalled();
  });

  it("posts forms with a plain request when the site accepts it", async () => {
    vi.spyOn(fallback, "postForm").mockResolvedValue("<li>plain</li>");

    await expect(
      createRenderedFetcher().postForm("https://example.com/wp-admin/admin-ajax.php", { action: "a" }, {}),
    ).resolves.toBe("<li>plain</li>");
    expect(launchBrowser).not.toHaveBeenCalled();
  });

  it("repeats a refused form post from a page in the browser session", async () => {
    vi.spyOn(fallback, "postForm").mockResolvedValue(null);
    mockPage.evaluate.mockResolvedValueOnce("<li>session</li>");
    const headers = {
      Referer: "https://example.com/manhwa/x/",
      Origin: "https://example.com",
      "X-Requested-With": "XMLHttpRequest",
    };

    const body = await createRenderedFetcher().postForm(
      "https://example.com/wp-admin/admin-ajax.php",
      { action: "manga_get_chapters", manga: "42" },
      headers,
    );

    expect(body).toBe("<li>session</li>");
    expect(mockPage.goto).toHaveBeenCalledWith("https://example.com/manhwa/x/", {
      waitUntil: "domcontentloaded",
      timeout: 1000,
    });
    expect(mockPage.evaluate).toHaveBeenCalledWith(
      expect.any(Function),
      "https://example.com/wp-admin/admin-ajax.php",
      "action=manga_get_chapters&manga=42",
      "XMLHttpRequest",
    );
    expect(mockPage.close).toHaveBeenCalledTimes(1);
  });

  it("loads the site root before a session post without a referer", async () => {
    vi.spyOn(fallback, "postForm").mockResolvedValue(null);
    mockPage.evaluate.mockResolvedValueOnce(null);

    await expect(
      createRenderedFetcher().postForm("https://example.com/wp-admin/admin-ajax.php", { action: "a" }, {}),
    ).resolves.toBeNull();
    expect(mockPage.goto).toHaveBeenCalledWith("https://example.com/", {
      waitUntil: "domcontentloaded",
      timeout: 1000,
    });
  });

  it("closes the browser only if it was launched", async () => {
    const idle = createRenderedFetcher();
    await idle.close();
    expect(mockBrowser.close).not.toHaveBeenCalled();

    const used = createRenderedFetcher();
    await used.fetchPage("https://example.com/a/");
    await used.close();
    await used.close();
    expect(mockBrowser.close).toHaveBeenCalledTimes(1);
  });
});
