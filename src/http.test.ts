import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { DEFAULT_USER_AGENT } from "./browser.js";
import { CookieJar } from "./cookies.js";
import { FetchError, HttpClient, StaticFetcher } from "./http.js";

const fetchMock = vi.fn<typeof fetch>();

function respond(body: string | null, status = 200, headers: Record<string, string> = {}, statusText = ""): Response {
  return new Response(body, { status, headers, statusText });
}

describe("HttpClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("retries retryable statuses and returns the first success", async () => {
    fetchMock.mockResolvedValueOnce(respond("busy", 503)).mockResolvedValueOnce(respond("ok"));
    const client = new HttpClient({ timeout: 1000, retryDelay: 0 });

    await expect(client.send("https://example.com/", {}, (response) => response.text())).resolves.toBe("ok");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("retries network errors", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed")).mockResolvedValueOnce(respond("ok"));
    const client = new HttpClient({ timeout: 1000, retryDelay: 0 });

    await expect(client.send("https://example.com/", {}, (response) => response.text())).resolves.toBe("ok");
  });

  it("throws a FetchError without retrying client errors", async () => {
    fetchMock.mockResolvedValueOnce(respond("missing", 404, {}, "Not Found"));
    const client = new HttpClient({ timeout: 1000, retryDelay: 0 });

    const error = await client.send("https://example.com/x", {}, (response) => response.text()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 404, url: "https://example.com/x", message: "HTTP 404: Not Found" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("gives up after the configured retries", async () => {
    fetchMock.mockImplementation(async () => respond("busy", 502));
    const client = new HttpClient({ timeout: 1000, retryDelay: 0 });

    await expect(client.send("https://example.com/", { retries: 2 }, (response) => response.text())).rejects.toThrow(
      "HTTP 502",
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe("StaticFetcher", () => {
  let mockWarn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    mockWarn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    mockWarn.mockRestore();
  });

  const createFetcher = (credential: string | null = null) =>
    new StaticFetcher({ timeout: 1000, jar: new CookieJar(credential), retryDelay: 0 });

  describe("fetchPage", () => {
    it("returns the page with browser-like headers", async () => {
      fetchMock.mockResolvedValueOnce(respond("<html>listing</html>"));

      const page = await createFetcher("session=test-session").fetchPage("https://example.com/manhwa/x/");

      expect(page).toEqual({ url: "https://example.com/manhwa/x/", html: "<html>listing</html>", cookies: [] });
      expect(fetchMock).toHaveBeenCalledWith(
        "https://example.com/manhwa/x/",
        expect.objectContaining({
          method: "GET",
          headers: expect.objectContaining({
            "User-Agent": DEFAULT_USER_AGENT,
            "Accept-Language": "en-US,en;q=0.9",
            Referer: "https://example.com/",
            Cookie: "session=test-session",
          }),
        }),
      );
    });

    it("sends the referer and its origin when given", () => {
      const headers = createFetcher().pageHeaders("https://cdn.example.com/a", "https://example.com/manhwa/x/");
      expect(headers.Referer).toBe("https://example.com/manhwa/x/");
      expect(headers.Origin).toBe("https://example.com");
    });

    it("returns null and warns on failure", async () => {
      fetchMock.mockResolvedValueOnce(respond("gone", 404, {}, "Not Found"));

      await expect(createFetcher().fetchPage("https://example.com/x")).resolves.toBeNull();
      expect(mockWarn).toHaveBeenCalledWith("Failed to fetch page https://example.com/x: HTTP 404: Not Found");
    });
  });

  describe("fetchAsset", () => {
    it("returns the bytes of an image response", async () => {
      fetchMock.mockResolvedValueOnce(respond("PNGDATA", 200, { "content-type": "image/png" }));

      const bytes = await createFetcher().fetchAsset("https://cdn.example.com/1.png", { Referer: "https://example.com/" });

      expect(bytes?.toString()).toBe("PNGDATA");
    });

    it("rejects a non-image content type without retrying", async () => {
      fetchMock.mockResolvedValueOnce(respond("<html>blocked</html>", 200, { "content-type": "text/html" }));

      await expect(createFetcher().fetchAsset("https://cdn.example.com/1.png", {})).resolves.toBeNull();
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(mockWarn).toHaveBeenCalledWith(
        "Failed to fetch asset https://cdn.example.com/1.png: Unexpected content type text/html",
      );
    });
  });

  describe("probe", () => {
    it("accepts an image HEAD response", async () => {
      fetchMock.mockResolvedValueOnce(respond(null, 200, { "content-type": "image/jpeg" }));

      await expect(createFetcher().probe("https://cdn.example.com/1.jpg", {})).resolves.toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith("https://cdn.example.com/1.jpg", expect.objectContaining({ method: "HEAD" }));
    });

    it("falls back to a streamed GET when HEAD is rejected", async () => {
      fetchMock
        .mockResolvedValueOnce(respond(null, 405, {}, "Method Not Allowed"))
        .mockResolvedValueOnce(respond("JPEGDATA", 200, { "content-type": "image/jpeg" }));

      await expect(createFetcher().probe("https://cdn.example.com/1.jpg", {})).resolves.toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fetchMock).toHaveBeenLastCalledWith("https://cdn.example.com/1.jpg", expect.objectContaining({ method: "GET" }));
    });

    it("rejects URLs that answer with a non-image body", async () => {
      fetchMock
        .mockResolvedValueOnce(respond(null, 200, { "content-type": "text/html" }))
        .mockResolvedValueOnce(respond("<html></html>", 200, { "content-type": "text/html" }));

      await expect(createFetcher().probe("https://cdn.example.com/1.jpg", {})).resolves.toBe(false);
    });

    it("returns false when both requests fail", async () => {
      fetchMock.mockImplementation(async () => respond(null, 404, {}, "Not Found"));

      await expect(createFetcher().probe("https://cdn.example.com/1.jpg", {})).resolves.toBe(false);
    });
  });

  describe("postForm", () => {
    it("posts an urlencoded body", async () => {
      fetchMock.mockResolvedValueOnce(respond('<li><a href="/manhwa/x/chapter-1/">1</a></li>'));

      const body = await createFetcher().postForm(
        "https://example.com/wp-admin/admin-ajax.php",
        { action: "manga_get_chapters", manga: "42" },
        { "X-Requested-With": "XMLHttpRequest" },
      );

      expect(body).toBe('<li><a href="/manhwa/x/chapter-1/">1</a></li>');
      expect(fetchMock).toHaveBeenCalledWith(
        "https://example.com/wp-admin/admin-ajax.php",
        expect.objectContaining({
          method: "POST",
          body: "action=manga_get_chapters&manga=42",
          headers: expect.objectContaining({
            "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
            "X-Requested-With": "XMLHttpRequest",
          }),
        }),
      );
    });

    it("does not retry and returns null on failure", async () => {
      fetchMock.mockResolvedValueOnce(respond("error", 500, {}, "Internal Server Error"));

      await expect(createFetcher().postForm("https://example.com/wp-admin/admin-ajax.php", {}, {})).resolves.toBeNull();
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
