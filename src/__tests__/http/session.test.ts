import { describe, it, expect, vi, afterEach } from "vitest";

interface GotCall {
  url: string;
  timeout?: { request?: number };
  headers?: Record<string, string>;
}

interface GotReply {
  statusCode: number;
  statusMessage?: string;
  url: string;
  headers: Record<string, string | string[]>;
  body: Buffer;
}

function mockGot(reply: (options: GotCall) => GotReply) {
  const gotScraping = vi.fn(async (options: GotCall) => reply(options));
  vi.doMock("got-scraping", () => ({ gotScraping }));
  return gotScraping;
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.resetModules();
});

describe("KeepAliveSession", () => {
  it("returns the body, final URL and lower-cased headers on 2xx", async () => {
    const gotScraping = mockGot((options) => ({
      statusCode: 200,
      url: `${options.url}?redirected=1`,
      headers: { "Content-Type": "text/html", "Set-Cookie": ["a=1", "b=2"] },
      body: Buffer.from("<html></html>"),
    }));

    const { KeepAliveSession } = await import("../../http/session.js");
    const session = new KeepAliveSession();
    const outcome = await session.get("https://example.com/a");
    session.close();

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.finalUrl).toBe("https://example.com/a?redirected=1");
      expect(outcome.statusCode).toBe(200);
      expect(outcome.headers).toEqual({ "content-type": "text/html", "set-cookie": "a=1, b=2" });
      expect(outcome.body.toString()).toBe("<html></html>");
    }
    expect(gotScraping).toHaveBeenCalledWith(
      expect.objectContaining({
        url: "https://example.com/a",
        method: "GET",
        followRedirect: true,
        throwHttpErrors: false,
        responseType: "buffer",
        timeout: { request: 60_000 },
      })
    );
  });

  it("sends browser-like default headers merged with custom ones", async () => {
    const gotScraping = mockGot((options) => ({
      statusCode: 200,
      url: options.url,
      headers: {},
      body: Buffer.alloc(0),
    }));

    const { KeepAliveSession, DEFAULT_HEADERS } = await import("../../http/session.js");
    const session = new KeepAliveSession({ headers: { "X-Test": "1" } });
    await session.get("https://example.com/a");

    const headers = gotScraping.mock.calls[0][0].headers;
    expect(headers?.["User-Agent"]).toBe(DEFAULT_HEADERS["User-Agent"]);
    expect(headers?.["Accept-Language"]).toBe("de-DE,de;q=0.9,en;q=0.8");
    expect(headers?.["X-Test"]).toBe("1");
  });

  it("prefers a per-request timeout over the session default", async () => {
    const gotScraping = mockGot((options) => ({
      statusCode: 200,
      url: options.url,
      headers: {},
      body: Buffer.alloc(0),
    }));

    const { KeepAliveSession } = await import("../../http/session.js");
    const session = new KeepAliveSession({ timeoutMs: 10_000 });
    await session.get("https://example.com/a");
    await session.get("https://example.com/b", { timeoutMs: 90_000 });

    expect(gotScraping.mock.calls.map(([options]) => options.timeout)).toEqual([
      { request: 10_000 },
      { request: 90_000 },
    ]);
  });

  it("turns non-2xx responses into HttpStatusError outcomes", async () => {
    mockGot((options) => ({
      statusCode: 404,
      statusMessage: "Not Found",
      url: options.url,
      headers: {},
      body: Buffer.from("missing"),
    }));

    const { KeepAliveSession } = await import("../../http/session.js");
    const outcome = await new KeepAliveSession().get("https://example.com/a");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.name).toBe("HttpStatusError");
      expect(outcome.error.message).toBe("HTTP 404 Not Found for https://example.com/a");
      expect(outcome.error.retryable).toBe(false);
    }
  });

  it("turns thrown errors into TransportError outcomes", async () => {
    mockGot(() => {
      throw new Error("connect ETIMEDOUT");
    });

    const { KeepAliveSession } = await import("../../http/session.js");
    const outcome = await new KeepAliveSession().get("https://example.com/a");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.name).toBe("TransportError");
      expect(outcome.error.message).toBe(
        "Network failure for https://example.com/a: connect ETIMEDOUT"
      );
      expect(outcome.error.retryable).toBe(true);
    }
  });

  it("refuses requests after close", async () => {
    const gotScraping = mockGot((options) => ({
      statusCode: 200,
      url: options.url,
      headers: {},
      body: Buffer.alloc(0),
    }));

    const { KeepAliveSession } = await import("../../http/session.js");
    const session = new KeepAliveSession();
    session.close();
    session.close();
    const outcome = await session.get("https://example.com/a");

    expect(gotScraping).not.toHaveBeenCalled();
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe(
        "Network failure for https://example.com/a: session is closed"
      );
    }
  });

  it("creates a fresh session per factory call", async () => {
    mockGot((options) => ({ statusCode: 200, url: options.url, headers: {}, body: Buffer.alloc(0) }));

    const { createSessionFactory } = await import("../../http/session.js");
    const factory = createSessionFactory();

    expect(factory()).not.toBe(factory());
  });
});

describe("decodeBody", () => {
  it("decodes UTF-8 by default", async () => {
    const { decodeBody } = await import("../../http/session.js");
    expect(decodeBody(Buffer.from("Vermögensberater", "utf8"))).toBe("Vermögensberater");
  });

  it("honors the charset of the content type", async () => {
    const { decodeBody } = await import("../../http/session.js");
    const latin1 = Buffer.from([0x4d, 0xfc, 0x6e, 0x63, 0x68, 0x65, 0x6e]);
    expect(decodeBody(latin1, "text/html; charset=ISO-8859-1")).toBe("München");
  });

  it("falls back to UTF-8 for unknown charsets", async () => {
    const { decodeBody } = await import("../../http/session.js");
    expect(decodeBody(Buffer.from("Köln", "utf8"), 'text/html; charset="x-unknown"')).toBe("Köln");
  });
});
