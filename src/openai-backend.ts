import OpenAI from "openai";
import type { InferenceBackend, ModelInfo } from "./backend.js";
import type { LogSink } from "./logger.js";
import type { ContentBlock, GenerationRequest, Message } from "./types.js";
import { GenerationError, ModelError, errorMessage } from "./errors.js";
import { messageText } from "./session-registry.js";

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;
type StreamingBody = OpenAI.Chat.Completions.ChatCompletionCreateParamsStreaming;

export type OpenAIBackendOptions = {
  baseURL: string;
  apiKey: string;
  model: string;
  /** Injected client, mainly for tests. */
  client?: OpenAI;
  log?: LogSink;
};

/**
 * Talks to any server exposing the OpenAI chat-completions API (streaming,
 * multi-modal content parts, model listing).
 */
export class OpenAIBackend implements InferenceBackend {
  private readonly client: OpenAI;
  private model: string;
  private readonly log?: LogSink;

  constructor(options: OpenAIBackendOptions) {
    this.client = options.client ?? new OpenAI({ baseURL: options.baseURL, apiKey: options.apiKey });
    this.model = options.model;
    this.log = options.log;
    this.log?.info(`webchat: backend ${options.baseURL} (model=${this.model})`);
  }

  async *streamChat(request: GenerationRequest, signal: AbortSignal): AsyncGenerator<string> {
    const { params } = request;
    const body: StreamingBody = {
      model: this.model,
      messages: toOpenAIMessages(request.history),
      stream: true,
      temperature: params.temperature,
      top_p: params.topP,
      max_tokens: params.maxTokens,
      frequency_penalty: params.frequencyPenalty,
      presence_penalty: params.presencePenalty,
      stop: params.stop,
      seed: params.seed,
    };
    if (params.search.enabled) {
      body.web_search_options = { search_context_size: params.search.contextSize };
    }

    let stream: AsyncIterable<OpenAI.Chat.Completions.ChatCompletionChunk>;
    try {
      stream = await this.client.chat.completions.create(body, { signal });
    } catch (err) {
      throw toGenerationError(err, request.sessionId);
    }

    try {
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    } catch (err) {
      throw toGenerationError(err, request.sessionId);
    }
  }

  async listModels(): Promise<ModelInfo[]> {
    try {
      const models: ModelInfo[] = [];
      for await (const model of this.client.models.list()) {
        models.push({ id: model.id, ownedBy: model.owned_by });
      }
      return models;
    } catch (err) {
      throw new ModelError(`failed to list models: ${errorMessage(err)}`, { cause: err });
    }
  }

  async selectModel(modelId: string): Promise<void> {
    const models = await this.listModels();
    if (!models.some((m) => m.id === modelId)) {
      throw new ModelError(`unknown model: ${modelId}`);
    }
    this.log?.info(`webchat: model '${this.model}' → '${modelId}'`);
    this.model = modelId;
  }

  selectedModel(): string {
    return this.model;
  }
}

function toGenerationError(err: unknown, sessionId: string): GenerationError {
  if (err instanceof GenerationError) return err;
  const status = err instanceof OpenAI.APIError && err.status !== undefined ? ` (status ${err.status})` : "";
  return new GenerationError(`backend request failed${status}: ${errorMessage(err)}`, {
    cause: err,
    sessionId,
  });
}

export function toOpenAIMessages(history: readonly Message[]): ChatMessageParam[] {
  return history.map((message): ChatMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: messageText(message) };
      case "assistant":
        return { role: "assistant", content: messageText(message) };
      case "user": {
        const parts = message.content.map(toContentPart);
        const only = parts.length === 1 ? parts[0] : undefined;
        return { role: "user", content: only?.type === "text" ? only.text : parts };
      }
    }
  });
}

export function toContentPart(block: ContentBlock): ContentPart {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "file_text":
      return { type: "text", text: `File: ${block.name}\n\`\`\`\n${block.text}\n\`\`\`` };
    case "image":
      return {
        type: "image_url",
        image_url: { url: `data:${block.mimeType};base64,${block.data.toString("base64")}` },
      };
    case "audio":
      return {
        type: "input_audio",
        input_audio: {
          data: block.data.toString("base64"),
          format: block.mimeType === "audio/mpeg" ? "mp3" : "wav",
        },
      };
  }
}
