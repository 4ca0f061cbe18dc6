import { createParser } from "eventsource-parser";
import type { ReadableStream } from "node:stream/web";
import { fetch } from "undici";
import { ConnectionError, RequestTimeoutError, errorText } from "./errors.js";
import type { Logger } from "./logger.js";

export type StreamProbe = {
  url: string;
  status?: number;
  contentType: string;
  // no headers within the timeout; an open SSE stream may legitimately hold them back
  timedOut: boolean;
};

export type PushedEvent = {
  id?: string;
  event?: string;
  data: string;
};

const SSE_HEADERS = { accept: "text/event-stream", "cache-control": "no-cache" };

/** Reads the response head of an SSE endpoint and hangs up. */
export async function probeEventStream(url: string, timeoutMs: number): Promise<StreamProbe> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, { headers: SSE_HEADERS, signal: controller.signal });
    const probe: StreamProbe = {
      url,
      status: res.status,
      contentType: res.headers.get("content-type") ?? "",
      timedOut: false,
    };
    controller.abort();
    return probe;
  } catch (e) {
    if (controller.signal.aborted) return { url, contentType: "", timedOut: true };
    throw new ConnectionError(url, errorText(e), { cause: e });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Keeps an SSE subscription open and counts what the server pushes until close().
 */
export class EventStreamWatcher {
  status?: number;
  contentType = "";

  private readonly controller = new AbortController();
  private readonly received: PushedEvent[] = [];
  private pump?: Promise<void>;

  constructor(
    readonly url: string,
    private readonly logger?: Logger
  ) {}

  async open(timeoutMs: number): Promise<void> {
    const timer = setTimeout(() => this.controller.abort(), timeoutMs);
    let body: ReadableStream<Uint8Array> | null;
    try {
      const res = await fetch(this.url, { headers: SSE_HEADERS, signal: this.controller.signal });
      this.status = res.status;
      this.contentType = res.headers.get("content-type") ?? "";
      body = res.body;
    } catch (e) {
      if (this.controller.signal.aborted) throw new RequestTimeoutError(this.url, timeoutMs);
      throw new ConnectionError(this.url, errorText(e), { cause: e });
    } finally {
      clearTimeout(timer);
    }

    if (!body || !this.contentType.includes("text/event-stream")) {
      await body?.cancel();
      return;
    }

    const parser = createParser({
      onEvent: (event) => {
        this.received.push({ id: event.id, event: event.event, data: event.data });
      },
    });
    this.pump = this.consume(body, (chunk) => parser.feed(chunk));
  }

  get count(): number {
    return this.received.length;
  }

  events(): readonly PushedEvent[] {
    return [...this.received];
  }

  async close(): Promise<void> {
    this.controller.abort();
    await this.pump;
  }

  private async consume(body: ReadableStream<Uint8Array>, feed: (chunk: string) => void): Promise<void> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        feed(decoder.decode(value, { stream: true }));
      }
    } catch (e) {
      if (!this.controller.signal.aborted) {
        this.logger?.warn({ url: this.url, err: errorText(e) }, "event stream ended with an error");
      }
    }
  }
}
