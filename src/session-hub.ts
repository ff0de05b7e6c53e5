// Tracks which connections are viewing which session and fans events out to them

import type { LogSink } from "./logger.js";
import type { WsServerMessage } from "./types.js";

export interface Subscriber {
  readonly connectionId: string;
  send(msg: WsServerMessage): void;
  /** Resolves once the subscriber's outbound buffer is below its high-water mark. */
  waitForDrain(): Promise<void>;
}

export class SessionHub {
  private readonly viewers = new Map<string, Set<Subscriber>>();

  constructor(private readonly log?: LogSink) {}

  subscribe(sessionId: string, subscriber: Subscriber): void {
    let set = this.viewers.get(sessionId);
    if (!set) {
      set = new Set();
      this.viewers.set(sessionId, set);
    }
    set.add(subscriber);
  }

  unsubscribe(sessionId: string, subscriber: Subscriber): void {
    const set = this.viewers.get(sessionId);
    if (!set) return;
    set.delete(subscriber);
    if (set.size === 0) this.viewers.delete(sessionId);
  }

  unsubscribeAll(subscriber: Subscriber): void {
    for (const sessionId of [...this.viewers.keys()]) this.unsubscribe(sessionId, subscriber);
  }

  dropSession(sessionId: string): void {
    this.viewers.delete(sessionId);
  }

  viewerCount(sessionId: string): number {
    return this.viewers.get(sessionId)?.size ?? 0;
  }

  broadcast(sessionId: string, msg: WsServerMessage, except?: Subscriber): number {
    const set = this.viewers.get(sessionId);
    let sent = 0;
    if (set) {
      for (const subscriber of set) {
        if (subscriber === except) continue;
        subscriber.send(msg);
        sent++;
      }
    }
    if (msg.type !== "delta") {
      this.log?.info(`webchat: broadcast type=${msg.type} session=${sessionId} to=${sent} viewers`);
    }
    return sent;
  }

  async waitForDrain(sessionId: string): Promise<void> {
    const set = this.viewers.get(sessionId);
    if (!set || set.size === 0) return;
    await Promise.all([...set].map((subscriber) => subscriber.waitForDrain()));
  }
}
