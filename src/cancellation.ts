// Cancellation tokens for in-flight generations, one per session

import { GenerationBusyError } from "./errors.js";

export class CancellationToken {
  private readonly controller = new AbortController();

  constructor(readonly sessionId: string) {}

  /** Aborts together with the token; handed to the backend request. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get signalled(): boolean {
    return this.controller.signal.aborted;
  }

  trip(): void {
    if (!this.controller.signal.aborted) this.controller.abort();
  }
}

export class CancellationController {
  private readonly tokens = new Map<string, CancellationToken>();

  register(sessionId: string): CancellationToken {
    if (this.tokens.has(sessionId)) throw new GenerationBusyError(sessionId);
    const token = new CancellationToken(sessionId);
    this.tokens.set(sessionId, token);
    return token;
  }

  /** Returns false when nothing is registered: stopping twice, or after completion, is a no-op. */
  signal(sessionId: string): boolean {
    const token = this.tokens.get(sessionId);
    if (!token) return false;
    token.trip();
    return true;
  }

  isSignalled(token: CancellationToken): boolean {
    return token.signalled;
  }

  deregister(sessionId: string, token?: CancellationToken): void {
    const current = this.tokens.get(sessionId);
    if (!current) return;
    if (token && current !== token) return;
    this.tokens.delete(sessionId);
  }

  has(sessionId: string): boolean {
    return this.tokens.has(sessionId);
  }
}
