// Public surface for embedding the bridge in another process

export { resolveConfig, ConfigError, type AppConfig } from "./config.js";
export { createAppContext, type AppContext, type AppContextOverrides } from "./context.js";
export { startHttpServer, type RunningServer, type HttpServerOptions } from "./http-server.js";
export { createConsoleLogSink, type LogSink } from "./logger.js";
export type { InferenceBackend, ModelInfo } from "./backend.js";
export { OpenAIBackend } from "./openai-backend.js";
export { ChatError, type ErrorKind } from "./errors.js";
export type { WsClientInput } from "./protocol.js";
export type { WsServerMessage } from "./types.js";
