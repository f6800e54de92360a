import type { NotifyClient } from "./notify-client.js";
import type { EventAction, EventResult, NotifyEventInput, Severity } from "./types.js";

// ---------------------------------------------------------------------------
// EventBuilder
// ---------------------------------------------------------------------------

/**
 * Fluent construction of a notification request.
 *
 * ```ts
 * await client
 *   .event("deploy.failed")
 *   .withSeverity("High")
 *   .withTitle("Deploy failed")
 *   .withMetadata("commit", "abc123")
 *   .withAction("rollback", "Roll back", "https://ci.example.com/hooks/rollback")
 *   .send();
 * ```
 */
export class EventBuilder {
  private readonly request: NotifyEventInput;

  constructor(
    private readonly client: NotifyClient,
    eventType: string,
  ) {
    this.request = { eventType, title: "" };
  }

  withSeverity(severity: Severity): this {
    this.request.severity = severity;
    return this;
  }

  withTitle(title: string): this {
    this.request.title = title;
    return this;
  }

  withMessage(message: string): this {
    this.request.message = message;
    return this;
  }

  withSource(source: string): this {
    this.request.source = source;
    return this;
  }

  withEntityId(entityId: string): this {
    this.request.entityId = entityId;
    return this;
  }

  withApp(slug: string): this {
    this.request.appSlug = slug;
    return this;
  }

  withAppId(appId: string): this {
    this.request.appId = appId;
    return this;
  }

  withMetadata(key: string, value: unknown): this;
  withMetadata(metadata: Record<string, unknown>): this;
  withMetadata(keyOrMetadata: string | Record<string, unknown>, value?: unknown): this {
    if (typeof keyOrMetadata === "string") {
      this.request.metadata = { ...this.request.metadata, [keyOrMetadata]: value };
    } else {
      this.request.metadata = { ...keyOrMetadata };
    }
    return this;
  }

  withAction(actionId: string, label: string, webhookUrl?: string): this {
    const action: EventAction = webhookUrl === undefined ? { actionId, label } : { actionId, label, webhookUrl };
    this.request.actions = [...(this.request.actions ?? []), action];
    return this;
  }

  /** Copy of the request built so far. */
  build(): NotifyEventInput {
    return {
      ...this.request,
      ...(this.request.metadata ? { metadata: { ...this.request.metadata } } : {}),
      ...(this.request.actions ? { actions: [...this.request.actions] } : {}),
    };
  }

  send(): Promise<EventResult> {
    return this.client.notify(this.build());
  }
}
