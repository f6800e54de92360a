import { describe, it, expect } from "vitest";
import { NotifyEventRequestSchema, QueueFileSchema, QueuedRecordSchema } from "./events.js";
import { ClientMessageSchema, ServerMessageSchema } from "./realtime.js";

describe("NotifyEventRequestSchema", () => {
  it("defaults severity to Info", () => {
    expect(NotifyEventRequestSchema.parse({ eventType: "a", title: "b" })).toEqual({
      eventType: "a",
      title: "b",
      severity: "Info",
    });
  });

  it("rejects an unknown severity", () => {
    expect(NotifyEventRequestSchema.safeParse({ eventType: "a", title: "b", severity: "Fatal" }).success).toBe(false);
  });

  it("requires eventType and title", () => {
    expect(NotifyEventRequestSchema.safeParse({ eventType: "a" }).success).toBe(false);
    expect(NotifyEventRequestSchema.safeParse({ title: "b" }).success).toBe(false);
  });

  it("requires appId to be a UUID", () => {
    const base = { eventType: "a", title: "b" };
    expect(NotifyEventRequestSchema.safeParse({ ...base, appId: "app-1" }).success).toBe(false);
    expect(
      NotifyEventRequestSchema.safeParse({ ...base, appId: "7b0c3a52-5a1e-4a34-9d0e-3c7b1f2a9e10" }).success,
    ).toBe(true);
  });
});

describe("QueueFileSchema", () => {
  it("accepts any array and rejects anything else", () => {
    expect(QueueFileSchema.safeParse([1, "two", {}]).success).toBe(true);
    expect(QueueFileSchema.safeParse({ items: [] }).success).toBe(false);
  });
});

describe("QueuedRecordSchema", () => {
  it("requires an ISO timestamp", () => {
    expect(QueuedRecordSchema.safeParse({ queuedAt: "yesterday", retryCount: 0, request: {} }).success).toBe(false);
  });

  it("rejects a negative retry count", () => {
    expect(
      QueuedRecordSchema.safeParse({ queuedAt: "2026-01-01T00:00:00Z", retryCount: -1, request: {} }).success,
    ).toBe(false);
  });
});

describe("ServerMessageSchema", () => {
  it("parses a completion with and without an error", () => {
    expect(ServerMessageSchema.parse({ type: "completion", id: "c-1" })).toEqual({ type: "completion", id: "c-1" });
    expect(ServerMessageSchema.parse({ type: "completion", id: "c-1", error: "nope" })).toEqual({
      type: "completion",
      id: "c-1",
      error: "nope",
    });
  });

  it("rejects unknown types and extra keys", () => {
    expect(ServerMessageSchema.safeParse({ type: "hello" }).success).toBe(false);
    expect(ServerMessageSchema.safeParse({ type: "ping", ts: 1, extra: true }).success).toBe(false);
  });

  it("rejects a negative unread count", () => {
    expect(ServerMessageSchema.safeParse({ type: "unread_count_changed", count: -1 }).success).toBe(false);
  });
});

describe("ClientMessageSchema", () => {
  it("accepts only known hub methods", () => {
    const invoke = { type: "invoke", id: "c-1", method: "SubscribeToApp", args: ["app-1"] };
    expect(ClientMessageSchema.safeParse(invoke).success).toBe(true);
    expect(ClientMessageSchema.safeParse({ ...invoke, method: "DropDatabase" }).success).toBe(false);
  });
});
