// Lv.4 Wires the long-lived components together for one server instance

import type { AppConfig } from "./config.js";
import type { InferenceBackend } from "./backend.js";
import type { LogSink } from "./logger.js";
import { AttachmentEncoder, loadTextExtensions } from "./attachment-encoder.js";
import { CancellationController } from "./cancellation.js";
import { ChatService, type ReplyNotifier } from "./chat-service.js";
import { GenerationBridge } from "./generation-bridge.js";
import { OpenAIBackend } from "./openai-backend.js";
import { PushNotifier } from "./push.js";
import { SessionHub } from "./session-hub.js";
import { SessionRegistry } from "./session-registry.js";

export type AppContext = {
  config: AppConfig;
  registry: SessionRegistry;
  cancellation: CancellationController;
  bridge: GenerationBridge;
  hub: SessionHub;
  chat: ChatService;
  encoder: AttachmentEncoder;
  backend: InferenceBackend;
  push?: PushNotifier;
  log?: LogSink;
};

export type AppContextOverrides = {
  backend?: InferenceBackend;
  /** Replaces the web-push notifier, whether or not push is enabled. */
  notifier?: ReplyNotifier;
  log?: LogSink;
};

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const { log } = overrides;
  const backend =
    overrides.backend ??
    new OpenAIBackend({
      baseURL: config.backend.baseURL,
      apiKey: config.backend.apiKey,
      model: config.backend.model,
      log,
    });
  const push = config.push.enabled
    ? new PushNotifier({ storeDir: config.push.storeDir, subject: config.push.subject, log })
    : undefined;

  const cancellation = new CancellationController();
  const bridge = new GenerationBridge(backend, cancellation, {
    channelCapacity: config.channelCapacity,
    cancelCheckInterval: config.cancelCheckInterval,
    log,
  });
  const hub = new SessionHub(log);
  // Deleting a session first stops and settles its turn; the service is built below.
  const registry: SessionRegistry = new SessionRegistry({
    defaultTitle: config.defaultTitle,
    cancelGeneration: (sessionId) => chat.stopAndSettle(sessionId),
    log,
  });
  const chat: ChatService = new ChatService({
    registry,
    bridge,
    hub,
    notifier: overrides.notifier ?? push,
    log,
  });

  return {
    config,
    registry,
    cancellation,
    bridge,
    hub,
    chat,
    encoder: new AttachmentEncoder(config.attachments, loadTextExtensions()),
    backend,
    ...(push && { push }),
    log,
  };
}
