import { describe, it, expect, vi } from "vitest";
import { EventBuilder } from "./event-builder.js";
import { NotifyClient } from "./notify-client.js";
import { silentLogger } from "./log.js";

function createClient(): NotifyClient {
  return new NotifyClient({ apiKey: "test-key", enableOfflineQueue: false, logger: silentLogger });
}

describe("EventBuilder", () => {
  it("starts with the event type and an empty title", () => {
    expect(new EventBuilder(createClient(), "user.signup").build()).toEqual({ eventType: "user.signup", title: "" });
  });

  it("sets every field", () => {
    const request = new EventBuilder(createClient(), "job.failed")
      .withSeverity("Critical")
      .withTitle("Nightly export failed")
      .withMessage("exit code 2")
      .withSource("scheduler")
      .withEntityId("job-17")
      .withApp("reports")
      .withAppId("7b0c3a52-5a1e-4a34-9d0e-3c7b1f2a9e10")
      .build();

    expect(request).toEqual({
      eventType: "job.failed",
      severity: "Critical",
      title: "Nightly export failed",
      message: "exit code 2",
      source: "scheduler",
      entityId: "job-17",
      appSlug: "reports",
      appId: "7b0c3a52-5a1e-4a34-9d0e-3c7b1f2a9e10",
    });
  });

  it("merges metadata keys and replaces on a whole record", () => {
    const builder = new EventBuilder(createClient(), "x").withMetadata("a", 1).withMetadata("b", "two");
    expect(builder.build().metadata).toEqual({ a: 1, b: "two" });

    builder.withMetadata({ c: true });
    expect(builder.build().metadata).toEqual({ c: true });
  });

  it("appends actions and omits an absent webhook", () => {
    const request = new EventBuilder(createClient(), "x")
      .withAction("ack", "Acknowledge")
      .withAction("retry", "Retry", "https://hooks.test/retry")
      .build();

    expect(request.actions).toStrictEqual([
      { actionId: "ack", label: "Acknowledge" },
      { actionId: "retry", label: "Retry", webhookUrl: "https://hooks.test/retry" },
    ]);
  });

  it("build() returns a copy", () => {
    const builder = new EventBuilder(createClient(), "x").withMetadata("a", 1).withAction("ack", "Ack");
    const first = builder.build();
    first.title = "changed";
    first.metadata = { ...first.metadata, b: 2 };
    first.actions?.push({ actionId: "extra", label: "Extra" });

    expect(builder.build()).toEqual({
      eventType: "x",
      title: "",
      metadata: { a: 1 },
      actions: [{ actionId: "ack", label: "Ack" }],
    });
  });

  it("send() hands the built request to the client", async () => {
    const client = createClient();
    const notify = vi.spyOn(client, "notify").mockResolvedValue({ success: true, queued: false });

    const result = await new EventBuilder(client, "x").withTitle("hello").send();

    expect(result).toEqual({ success: true, queued: false });
    expect(notify).toHaveBeenCalledWith({ eventType: "x", title: "hello" });
  });
});
