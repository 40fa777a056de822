import { PassThrough, type Readable } from "node:stream";

import { formatError, log } from "./logger";

/**
 * Shares one local input stream between concurrently running relays.
 *
 * Each chunk read from the source goes to exactly one subscriber, rotating through the
 * live subscribers in the order they subscribed. The source is only read while someone
 * is subscribed; chunks that arrive with nobody subscribed are held for the next one.
 */
export class InputDispatcher {
  private readonly subscribers: PassThrough[] = [];
  private readonly pending: Buffer[] = [];
  private next = 0;
  private ended = false;
  private closed = false;

  constructor(private readonly source: Readable) {
    source.on("data", this.onData);
    source.on("end", this.onEnd);
    source.on("error", this.onError);
    source.pause();
  }

  get subscriberCount(): number {
    return this.subscribers.length;
  }

  subscribe(): PassThrough {
    const sub = new PassThrough();
    if (this.ended || this.closed) {
      sub.end();
      return sub;
    }
    this.subscribers.push(sub);
    sub.once("close", () => this.remove(sub));
    this.flushPending();
    this.updateFlow();
    return sub;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.source.off("data", this.onData);
    this.source.off("end", this.onEnd);
    this.source.off("error", this.onError);
    this.source.pause();
    for (const sub of this.subscribers.splice(0)) sub.destroy();
    this.pending.length = 0;
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    const target = this.pick();
    if (!target) {
      this.pending.push(buf);
      this.updateFlow();
      return;
    }
    this.deliver(target, buf);
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    for (const sub of this.subscribers.splice(0)) sub.end();
  };

  private readonly onError = (err: Error): void => {
    log("warn", "conn_close", { direction: "input_to_socket", err: formatError(err) });
    this.onEnd();
  };

  private pick(): PassThrough | null {
    if (this.subscribers.length === 0) return null;
    const idx = this.next % this.subscribers.length;
    this.next = idx + 1;
    return this.subscribers[idx];
  }

  private deliver(target: PassThrough, buf: Buffer): void {
    if (target.write(buf)) return;
    this.source.pause();
    target.once("drain", () => this.updateFlow());
  }

  private flushPending(): void {
    while (this.pending.length > 0) {
      const target = this.pick();
      const buf = this.pending.shift();
      if (!target || !buf) return;
      this.deliver(target, buf);
    }
  }

  private remove(sub: PassThrough): void {
    const idx = this.subscribers.indexOf(sub);
    if (idx === -1) return;
    this.subscribers.splice(idx, 1);
    if (idx < this.next) this.next -= 1;
    this.updateFlow();
  }

  private updateFlow(): void {
    if (this.closed || this.ended) return;
    if (this.subscribers.length > 0 && this.pending.length === 0) this.source.resume();
    else this.source.pause();
  }
}
