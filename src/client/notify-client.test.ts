import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NotifyClient } from "./notify-client.js";
import { silentLogger, type Logger } from "./log.js";
import type { NotifyClientConfig } from "./types.js";

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function abortError(): Error {
  const err = new Error("This operation was aborted");
  err.name = "AbortError";
  return err;
}

function requestAt(index: number): { url: string; init: RequestInit | undefined } {
  const call = fetchMock.mock.calls[index];
  return { url: String(call?.[0]), init: call?.[1] };
}

function bodyAt(index: number): unknown {
  return JSON.parse(String(requestAt(index).init?.body));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("NotifyClient", () => {
  let dir: string;
  let client: NotifyClient | null = null;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "notify-client-"));
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(async () => {
    client?.close();
    client = null;
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  function createClient(overrides: Partial<NotifyClientConfig> = {}): NotifyClient {
    client = new NotifyClient({
      apiKey: "test-key",
      baseUrl: "https://notify.test",
      offlineQueueDirectory: dir,
      autoRetry: false,
      logger: silentLogger,
      ...overrides,
    });
    return client;
  }

  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------

  it("requires an API key", () => {
    expect(() => new NotifyClient({ apiKey: "" })).toThrow("API key is required");
  });

  it("rejects a base URL that is only slashes", () => {
    expect(() => new NotifyClient({ apiKey: "test-key", baseUrl: "//", enableOfflineQueue: false })).toThrow(
      "baseUrl must be a non-empty string",
    );
  });

  it("has no offline queue when disabled", () => {
    expect(createClient({ enableOfflineQueue: false }).offlineQueue).toBeNull();
  });

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  it("posts the event with bearer auth and reports the created id", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: "evt-1", status: "Pending" }, 201));
    const c = createClient({ defaultAppSlug: "shop", defaultSource: "checkout" });

    const result = await c.notify("order.created", "Order 7 created");

    expect(result).toEqual({ success: true, eventId: "evt-1", status: "Pending", queued: false });
    const { url, init } = requestAt(0);
    expect(url).toBe("https://notify.test/api/v1/events");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-key",
      Accept: "application/json",
      "Content-Type": "application/json",
    });
    expect(bodyAt(0)).toEqual({
      appSlug: "shop",
      eventType: "order.created",
      severity: "Info",
      source: "checkout",
      title: "Order 7 created",
    });
  });

  it("strips trailing slashes from the base URL", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: "evt-1", status: "Pending" }));
    const c = createClient({ baseUrl: "https://notify.test/" });

    await c.notify("a", "b");
    expect(requestAt(0).url).toBe("https://notify.test/api/v1/events");
  });

  it("prefers the request's app and source over the defaults", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: "evt-2", status: "Pending" }));
    const c = createClient({ defaultAppSlug: "shop", defaultSource: "checkout" });

    await c.notify({
      eventType: "refund.issued",
      title: "Refund",
      appSlug: "billing",
      source: "worker",
      severity: "High",
      message: "Refund of 12.00",
      entityId: "order-7",
      metadata: { amount: 12 },
      actions: [{ actionId: "view", label: "View" }],
    });

    expect(bodyAt(0)).toEqual({
      appSlug: "billing",
      eventType: "refund.issued",
      severity: "High",
      source: "worker",
      title: "Refund",
      message: "Refund of 12.00",
      entityId: "order-7",
      metadata: { amount: 12 },
      actions: [{ actionId: "view", label: "View" }],
    });
  });

  it("passes short-form options through", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: "evt-3", status: "Pending" }));
    const c = createClient();

    await c.notify("disk.full", "Disk full", { severity: "Critical", message: "/var at 99%" });

    expect(bodyAt(0)).toEqual({
      eventType: "disk.full",
      severity: "Critical",
      title: "Disk full",
      message: "/var at 99%",
    });
  });

  it("succeeds without ids when the response body is not JSON", async () => {
    fetchMock.mockResolvedValue(new Response("accepted", { status: 202 }));
    const result = await createClient().notify("a", "b");
    expect(result).toEqual({ success: true, eventId: undefined, status: undefined, queued: false });
  });

  it("rejects an invalid request without sending it", async () => {
    const c = createClient();
    const result = await c.notify({ eventType: "a", title: "b", appId: "not-a-uuid" });

    expect(result).toEqual({ success: false, error: "Invalid request: appId: Invalid uuid", queued: false });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(await c.offlineQueue?.count()).toBe(0);
  });

  // -------------------------------------------------------------------------
  // Failures and the offline queue
  // -------------------------------------------------------------------------

  it("queues a request the server rejected and reports the response text", async () => {
    fetchMock.mockResolvedValue(new Response("upstream unavailable", { status: 500 }));
    const c = createClient();

    const result = await c.notify("a", "b");

    expect(result).toEqual({ success: false, error: "upstream unavailable", queued: true });
    const items = (await c.offlineQueue?.list()) ?? [];
    expect(items.map((item) => item.request)).toEqual([{ eventType: "a", title: "b", severity: "Info" }]);
  });

  it("falls back to the status code when the error body is empty", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 503 }));
    const result = await createClient().notify("a", "b");
    expect(result.error).toBe("HTTP 503");
  });

  it("queues on a network error and logs it", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const c = createClient({ logger });

    const result = await c.notify("order.created", "b");

    expect(result).toEqual({ success: false, error: "fetch failed", queued: true });
    expect(logger.warn).toHaveBeenCalledWith('Send of "order.created" failed, queued for retry: fetch failed');
    expect(await c.offlineQueue?.count()).toBe(1);
  });

  it("reports a timeout when the request is aborted", async () => {
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(abortError()));
        }),
    );
    const result = await createClient({ timeoutMs: 20 }).notify("a", "b");
    expect(result).toEqual({ success: false, error: "Request timeout after 20ms", queued: true });
  });

  it("does not queue when the offline queue is disabled", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const result = await createClient({ enableOfflineQueue: false }).notify("a", "b");
    expect(result).toEqual({ success: false, error: "fetch failed", queued: false });
  });

  it("retryQueued() delivers queued requests and empties the queue", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    fetchMock.mockResolvedValue(jsonResponse({ id: "evt-9", status: "Pending" }));
    const c = createClient();

    await c.notify("a", "b");
    expect(await c.retryQueued()).toBe(1);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(bodyAt(1)).toEqual(bodyAt(0));
    expect(await c.offlineQueue?.count()).toBe(0);
  });

  it("does not queue a second copy when a retried send fails again", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const c = createClient();

    await c.notify("a", "b");
    expect(await c.retryQueued()).toBe(0);
    expect(await c.offlineQueue?.count()).toBe(1);
  });

  it("keeps queued requests when an invalid one is enqueued directly", async () => {
    const queue = createClient().offlineQueue;
    if (!queue) throw new Error("offline queue should be enabled");

    await queue.enqueue({ eventType: "a", title: "A", severity: "Info" });
    await queue.enqueue({ eventType: "b", title: "B", severity: "Info", appId: "not-a-uuid" });
    await queue.enqueue({ eventType: "c", title: "C", severity: "Info" });

    expect((await queue.list()).map((item) => item.request.title)).toEqual(["A", "C"]);
  });

  it("retryQueued() resolves 0 without a queue", async () => {
    expect(await createClient({ enableOfflineQueue: false }).retryQueued()).toBe(0);
  });

  it("close() stops the retry timer", () => {
    const c = createClient({ autoRetry: true });
    expect(c.offlineQueue?.isRunning).toBe(true);
    c.close();
    expect(c.offlineQueue?.isRunning).toBe(false);
  });

  // -------------------------------------------------------------------------
  // Builder
  // -------------------------------------------------------------------------

  it("sends what the fluent builder assembles", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: "evt-4", status: "Pending" }));
    const c = createClient();

    const result = await c
      .event("deploy.failed")
      .withSeverity("High")
      .withTitle("Deploy failed")
      .withMetadata("commit", "abc123")
      .withAction("rollback", "Roll back")
      .send();

    expect(result.success).toBe(true);
    expect(bodyAt(0)).toEqual({
      eventType: "deploy.failed",
      severity: "High",
      title: "Deploy failed",
      metadata: { commit: "abc123" },
      actions: [{ actionId: "rollback", label: "Roll back" }],
    });
  });
});
