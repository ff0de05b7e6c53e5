// Lv.2 Generation bridge: runs one backend call per session and republishes
// its output as delta events followed by exactly one terminal event.

import type { InferenceBackend } from "./backend.js";
import type { CancellationController, CancellationToken } from "./cancellation.js";
import type { LogSink } from "./logger.js";
import type {
  GenerationEvent,
  GenerationParams,
  GenerationRequest,
  Message,
  TerminalEvent,
} from "./types.js";
import { BoundedChannel, ChannelClosedError } from "./bounded-channel.js";
import { GenerationBusyError, GenerationError, errorMessage } from "./errors.js";
import { DEFAULT_CANCEL_CHECK_INTERVAL, DEFAULT_CHANNEL_CAPACITY } from "./types.js";

export interface Generation extends AsyncIterable<GenerationEvent> {
  readonly sessionId: string;
  /** Resolves with the terminal event once the backend call has been released. */
  readonly finished: Promise<TerminalEvent>;
}

type ActiveGeneration = {
  token: CancellationToken;
  text: string;
  finished: Promise<TerminalEvent>;
};

export type GenerationBridgeOptions = {
  /** Events buffered between producer and consumer before the backend is paused. */
  channelCapacity?: number;
  /** Output units consumed between two cancellation checks. */
  cancelCheckInterval?: number;
  log?: LogSink;
};

export class GenerationBridge {
  private readonly active = new Map<string, ActiveGeneration>();
  private readonly channelCapacity: number;
  private readonly cancelCheckInterval: number;
  private readonly log?: LogSink;

  constructor(
    private readonly backend: InferenceBackend,
    private readonly cancellation: CancellationController,
    options: GenerationBridgeOptions = {},
  ) {
    this.channelCapacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
    this.cancelCheckInterval = options.cancelCheckInterval ?? DEFAULT_CANCEL_CHECK_INTERVAL;
    if (!Number.isInteger(this.cancelCheckInterval) || this.cancelCheckInterval < 1) {
      throw new RangeError(`cancelCheckInterval must be a positive integer`);
    }
    this.log = options.log;
  }

  start(
    sessionId: string,
    history: readonly Message[],
    userMessage: Message,
    params: GenerationParams,
  ): Generation {
    if (this.active.has(sessionId)) throw new GenerationBusyError(sessionId);

    const token = this.cancellation.register(sessionId);
    const channel = new BoundedChannel<GenerationEvent>(this.channelCapacity);
    const request: GenerationRequest = {
      sessionId,
      history: [...history, userMessage],
      params,
    };

    let settle: (event: TerminalEvent) => void = () => undefined;
    const finished = new Promise<TerminalEvent>((resolve) => {
      settle = resolve;
    });
    const entry: ActiveGeneration = { token, text: "", finished };
    this.active.set(sessionId, entry);
    this.log?.info(
      `webchat: generation started (session=${sessionId}, messages=${request.history.length})`,
    );

    void this.produce(request, entry, channel).then(settle);

    return {
      sessionId,
      finished,
      [Symbol.asyncIterator]: () => channel[Symbol.asyncIterator](),
    };
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  get activeCount(): number {
    return this.active.size;
  }

  stop(sessionId: string): boolean {
    return this.cancellation.signal(sessionId);
  }

  async stopAndWait(sessionId: string): Promise<TerminalEvent | undefined> {
    const entry = this.active.get(sessionId);
    if (!entry) return undefined;
    this.cancellation.signal(sessionId);
    return entry.finished;
  }

  private async produce(
    request: GenerationRequest,
    entry: ActiveGeneration,
    channel: BoundedChannel<GenerationEvent>,
  ): Promise<TerminalEvent> {
    const { sessionId } = request;
    const { token } = entry;
    let iterator: AsyncIterator<string> | undefined;
    let terminal: TerminalEvent;
    let units = 0;

    try {
      iterator = this.backend.streamChat(request, token.signal)[Symbol.asyncIterator]();
      terminal = { type: "done", finalText: "" };
      for (;;) {
        if (units === 0 && this.cancellation.isSignalled(token)) {
          terminal = { type: "cancelled", partialText: entry.text };
          break;
        }
        const result = await iterator.next();
        if (result.done) {
          terminal = { type: "done", finalText: entry.text };
          break;
        }
        units++;
        if (units % this.cancelCheckInterval === 0 && this.cancellation.isSignalled(token)) {
          terminal = { type: "cancelled", partialText: entry.text };
          break;
        }
        if (!result.value) continue;
        entry.text += result.value;
        await channel.send({ type: "delta", text: result.value });
      }
    } catch (err) {
      if (this.cancellation.isSignalled(token) || err instanceof ChannelClosedError) {
        terminal = { type: "cancelled", partialText: entry.text };
      } else {
        const cause =
          err instanceof GenerationError
            ? err
            : new GenerationError(errorMessage(err), { cause: err, sessionId });
        terminal = { type: "error", cause };
      }
    }

    if (terminal.type !== "done" && iterator?.return) {
      await this.release(sessionId, iterator);
    }

    this.cancellation.deregister(sessionId, token);
    this.active.delete(sessionId);
    this.logTerminal(sessionId, terminal);

    try {
      await channel.send(terminal);
    } catch {
      // send() only fails once the consumer has closed the channel
      this.log?.warn(`webchat: generation consumer gone before ${terminal.type} (session=${sessionId})`);
    }
    channel.close();
    return terminal;
  }

  private async release(sessionId: string, iterator: AsyncIterator<string>): Promise<void> {
    try {
      await iterator.return?.();
    } catch (err) {
      this.log?.warn(`webchat: backend stream release failed (session=${sessionId}): ${errorMessage(err)}`);
    }
  }

  private logTerminal(sessionId: string, terminal: TerminalEvent): void {
    switch (terminal.type) {
      case "done":
        this.log?.info(
          `webchat: generation done (session=${sessionId}, chars=${terminal.finalText.length})`,
        );
        break;
      case "cancelled":
        this.log?.info(
          `webchat: generation cancelled (session=${sessionId}, chars=${terminal.partialText.length})`,
        );
        break;
      case "error":
        this.log?.error(
          `webchat: generation failed (session=${sessionId}): ${terminal.cause.message}`,
        );
        break;
    }
  }
}
