// Boundary to the external inference engine. Everything behind this interface
// (sampling, model loading, batching) belongs to the engine, not to this server.

import type { GenerationRequest } from "./types.js";

export type ModelInfo = {
  id: string;
  ownedBy?: string;
};

export interface InferenceBackend {
  /**
   * Streams the reply as text units. Aborting `signal` must end the stream and
   * release the underlying request.
   */
  streamChat(request: GenerationRequest, signal: AbortSignal): AsyncIterable<string>;

  listModels(): Promise<ModelInfo[]>;

  /** Routes subsequent requests to `modelId`; rejects with ModelError if unknown. */
  selectModel(modelId: string): Promise<void>;

  selectedModel(): string;
}
