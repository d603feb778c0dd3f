import OpenAI from "openai";
import type { Logger } from "../logging/logger.js";
import {
  AppError,
  ErrorCodes,
  rateLimited,
  systemError,
  temporary,
  userError,
} from "../errors/app-error.js";
import { isJsonObject, mapFromJson } from "../utils/value.js";
import { headerReader, parseRetryAfterHeaders, parseRetryAfterMessage } from "./retry-after.js";
import type { ModelProvider, ModelRequest, ModelResponse, ModelToolCall, StreamSink } from "./types.js";

export interface OpenAIProviderOptions {
  /** Breaker and log name; defaults to "openai". */
  readonly id?: string;
  readonly tier?: number;
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly maxTokens?: number;
  readonly temperature?: number;
}

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

interface PartialToolCall {
  id: string;
  name: string;
  args: string;
}

export function createOpenAIProvider(opts: OpenAIProviderOptions, logger: Logger): ModelProvider {
  const id = opts.id ?? "openai";
  // Retries belong to the gateway
  const client = new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseUrl,
    maxRetries: 0,
    timeout: opts.timeoutMs ?? 60_000,
  });

  function buildMessages(request: ModelRequest): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (request.system) messages.push({ role: "system", content: request.system });
    messages.push({ role: "user", content: request.prompt });
    return messages;
  }

  function buildTools(request: ModelRequest): ChatTool[] | undefined {
    if (!request.tools || request.tools.length === 0) return undefined;
    return request.tools.map((t) => ({
      type: "function" as const,
      function: { name: t.name, description: t.description, parameters: { ...t.parameters } },
    }));
  }

  async function complete(request: ModelRequest): Promise<ModelResponse> {
    const startTime = Date.now();
    const response = await client.chat.completions.create(
      {
        model: opts.model,
        messages: buildMessages(request),
        tools: buildTools(request),
        max_tokens: request.maxTokens ?? opts.maxTokens,
        temperature: request.temperature ?? opts.temperature,
        ...(request.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
      },
      { signal: request.signal },
    );

    const choice = response.choices[0];
    logger.debug(
      { model: opts.model, durationMs: Date.now() - startTime, finishReason: choice?.finish_reason, tokens: response.usage?.total_tokens },
      "Chat completion response",
    );
    if (!choice) {
      throw temporary(ErrorCodes.MODEL_INVALID_RESPONSE, "Model returned no choices");
    }

    const toolCalls: ModelToolCall[] = (choice.message.tool_calls ?? []).map((tc) =>
      toToolCall(tc.id, tc.function.name, tc.function.arguments),
    );

    return {
      text: choice.message.content ?? "",
      toolCalls,
      tokensUsed: response.usage?.total_tokens ?? 0,
      model: response.model,
      provider: id,
    };
  }

  async function streamed(request: ModelRequest, onChunk: StreamSink): Promise<ModelResponse> {
    const stream = await client.chat.completions.create(
      {
        model: opts.model,
        messages: buildMessages(request),
        tools: buildTools(request),
        max_tokens: request.maxTokens ?? opts.maxTokens,
        temperature: request.temperature ?? opts.temperature,
        stream: true,
        stream_options: { include_usage: true },
      },
      { signal: request.signal },
    );

    let text = "";
    let tokensUsed = 0;
    let model = opts.model;
    const partials = new Map<number, PartialToolCall>();

    for await (const chunk of stream) {
      model = chunk.model || model;
      if (chunk.usage) tokensUsed = chunk.usage.total_tokens;
      const delta = chunk.choices[0]?.delta;
      if (!delta) continue;

      if (delta.content) {
        text += delta.content;
        onChunk(delta.content);
      }
      for (const tc of delta.tool_calls ?? []) {
        const existing = partials.get(tc.index) ?? { id: "", name: "", args: "" };
        if (tc.id) existing.id = tc.id;
        if (tc.function?.name) existing.name += tc.function.name;
        if (tc.function?.arguments) existing.args += tc.function.arguments;
        partials.set(tc.index, existing);
      }
    }

    const toolCalls: ModelToolCall[] = [...partials.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, p]) => toToolCall(p.id, p.name, p.args));

    return { text, toolCalls, tokensUsed, model, provider: id };
  }

  return {
    id,
    ...(opts.tier !== undefined ? { tier: opts.tier } : {}),

    async generate(request, onChunk) {
      try {
        return request.stream && onChunk ? await streamed(request, onChunk) : await complete(request);
      } catch (err) {
        throw classifyOpenAIError(err);
      }
    },
  };
}

/**
 * Decodes one tool call's argument string. A malformed payload fails only
 * that call; the rest of the response stays usable.
 */
export function toToolCall(id: string, name: string, rawArgs: string): ModelToolCall {
  if (rawArgs.trim() === "") return { id, name, input: {} };
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArgs);
  } catch {
    return { id, name, input: {}, error: `Arguments for ${name} are not valid JSON` };
  }
  if (!isJsonObject(parsed)) {
    return { id, name, input: {}, error: `Arguments for ${name} must be a JSON object` };
  }
  return { id, name, input: mapFromJson(parsed) };
}

/** Maps SDK failures onto the error taxonomy the gateway retries on. */
export function classifyOpenAIError(err: unknown): AppError {
  if (err instanceof AppError) return err;

  if (err instanceof OpenAI.APIUserAbortError) {
    return systemError(ErrorCodes.CANCELLED, "Model request was cancelled", { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return temporary(ErrorCodes.MODEL_TIMEOUT, "Model request timed out", { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return temporary(ErrorCodes.MODEL_UNAVAILABLE, "Could not reach the model endpoint", { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status ?? 0;
    if (status === 429) {
      const retryAfterMs =
        parseRetryAfterHeaders(headerReader(err.headers)) ?? parseRetryAfterMessage(err.message);
      return rateLimited(ErrorCodes.MODEL_RATE_LIMIT, "Model rate limit reached", retryAfterMs, { cause: err });
    }
    if (status === 401 || status === 403) {
      return userError(ErrorCodes.MODEL_AUTH, "Model credentials were rejected", {
        cause: err,
        suggestions: ["Check model.apiKey in the config file"],
      });
    }
    if (status === 400 || status === 404 || status === 422) {
      return userError(ErrorCodes.MODEL_INVALID_RESPONSE, `Model rejected the request: ${err.message}`, { cause: err });
    }
    if (status === 408 || status === 409 || status >= 500) {
      return temporary(ErrorCodes.MODEL_UNAVAILABLE, `Model endpoint error (${status})`, { cause: err });
    }
    return systemError(ErrorCodes.MODEL_UNAVAILABLE, err.message, { cause: err });
  }

  return temporary(ErrorCodes.MODEL_UNAVAILABLE, err instanceof Error ? err.message : String(err), { cause: err });
}
