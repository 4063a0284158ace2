import type { BackendConfig, OllamaGenerationSettings } from "../types";

export type MessageContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type ChatMessage = {
  role: "system" | "user";
  content: string | MessageContentPart[];
};

export interface NativeToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ChatCompletionRequestOptions {
  responseFormat?: "json_object";
  maxTokens?: number;
  tool?: NativeToolDefinition;
}

export interface OpenAiChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  response_format?: { type: "json_object" };
}

interface OllamaMessage {
  role: "system" | "user";
  content: string;
  images?: string[];
}

interface OllamaChatBody {
  model: string;
  stream: false;
  messages: OllamaMessage[];
  options: Record<string, number>;
  format?: "json";
  tools?: Array<{ type: "function"; function: NativeToolDefinition }>;
}

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

/** The request never reached the endpoint (DNS, CORS, connection refused). */
export class TransportError extends Error {
  url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = "TransportError";
    this.url = url;
  }
}

const JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
};

const OPENAI_DEV_PROXY = "/__proxy_openai";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringsAt(list: unknown, key: string): string[] {
  if (!Array.isArray(list)) return [];
  return list
    .map((entry) => (isRecord(entry) ? entry[key] : undefined))
    .filter((value): value is string => typeof value === "string" && value !== "");
}

export function dataUrlToBase64(url: string): string | null {
  const match = /^data:[^;]+;base64,(.+)$/.exec(url);
  return match?.[1] ?? null;
}

function toOllamaMessage(message: ChatMessage): OllamaMessage {
  if (typeof message.content === "string") {
    return { role: message.role, content: message.content };
  }

  const text = message.content
    .flatMap((part) => (part.type === "text" && part.text.trim() ? [part.text] : []))
    .join("\n")
    .trim();
  const images = message.content.flatMap((part) => {
    if (part.type !== "image_url") return [];
    const base64 = dataUrlToBase64(part.image_url.url);
    return base64 ? [base64] : [];
  });

  const converted: OllamaMessage = {
    role: message.role,
    content: text || "Read the menu in this image.",
  };
  if (images.length > 0) {
    converted.images = images;
  }
  return converted;
}

/**
 * On a local dev server, requests to api.openai.com go through the Vite
 * proxy because the API does not send CORS headers to browsers.
 */
function resolveBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim().replace(/\/+$/, "");
  if (typeof window === "undefined") return trimmed;

  const host = window.location.hostname;
  if (host !== "localhost" && host !== "127.0.0.1") return trimmed;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    // Not an absolute URL; fetch reports the problem with the original text.
    return trimmed;
  }
  if (parsed.protocol !== "https:" || parsed.hostname !== "api.openai.com") {
    return trimmed;
  }

  const path = parsed.pathname.replace(/\/+$/, "");
  if (path === "/v1") return `${OPENAI_DEV_PROXY}/v1`;
  if (path === "") return OPENAI_DEV_PROXY;
  return trimmed;
}

/** Users paste base URLs both with and without the /v1 suffix. */
function openAiPaths(path: string): string[] {
  return [path, `/v1${path}`];
}

/**
 * Tries each path in turn. Only a 404 moves on to the next path; an
 * unreachable URL or any other HTTP error is final.
 */
async function requestJson(
  baseUrl: string,
  paths: string[],
  init: RequestInit,
): Promise<unknown> {
  const root = resolveBaseUrl(baseUrl);
  let lastError: Error | null = null;

  for (const path of paths) {
    const url = `${root}${path}`;
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      throw new TransportError(
        url,
        error instanceof TypeError
          ? `Could not reach ${url} (network or CORS failure). For api.openai.com, run the local dev server so requests use its proxy.`
          : `Request to ${url} failed: ${error instanceof Error ? error.message : "Unknown network error"}`,
      );
    }

    if (response.ok) {
      return await response.json();
    }
    if (response.status === 404) {
      lastError = new HttpError(404, `Endpoint not found at ${path}.`);
      continue;
    }

    const detail = await response.text();
    throw new HttpError(
      response.status,
      `Request failed (${response.status}) at ${path}: ${detail.slice(0, 240)}`,
    );
  }

  throw lastError ?? new Error(`No endpoint responded. Tried: ${paths.join(", ")}`);
}

function openAiHeaders(apiKey: string): Record<string, string> {
  const key = apiKey.trim();
  return key ? { ...JSON_HEADERS, Authorization: `Bearer ${key}` } : JSON_HEADERS;
}

export async function listModels(
  config: Omit<BackendConfig, "model">,
): Promise<string[]> {
  if (!config.baseUrl.trim()) {
    throw new Error("Base URL is required.");
  }

  if (config.kind === "openai") {
    const data = await requestJson(config.baseUrl, openAiPaths("/models"), {
      method: "GET",
      headers: openAiHeaders(config.apiKey),
    });
    const ids = isRecord(data) ? stringsAt(data.data, "id") : [];
    if (ids.length === 0) {
      throw new Error("The endpoint returned no models. Enter a model ID manually.");
    }
    return ids.sort();
  }

  const data = await requestJson(config.baseUrl, ["/api/tags"], {
    method: "GET",
    headers: JSON_HEADERS,
  });
  const names = isRecord(data) ? stringsAt(data.models, "name") : [];
  if (names.length === 0) {
    throw new Error("Ollama returned no models from /api/tags. Enter a model name manually.");
  }
  return names.sort();
}

export function buildOpenAiChatCompletionBody(
  model: string,
  messages: ChatMessage[],
  requestOptions?: ChatCompletionRequestOptions,
): OpenAiChatCompletionBody {
  const body: OpenAiChatCompletionBody = { model, messages };
  if (requestOptions?.maxTokens) {
    body.max_tokens = requestOptions.maxTokens;
  }
  if (requestOptions?.responseFormat === "json_object") {
    body.response_format = { type: "json_object" };
  }
  return body;
}

export function parseOpenAiContent(data: unknown): string {
  const choices = isRecord(data) ? data.choices : undefined;
  const choice = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(choice) ? choice.message : undefined;
  const content = isRecord(message) ? message.content : undefined;

  if (typeof content === "string") {
    return content;
  }
  // Some compatible servers return content parts instead of a string.
  const text = stringsAt(content, "text").join("");
  if (text) return text;

  throw new Error("OpenAI-compatible endpoint returned an unexpected response shape.");
}

export function parseOllamaContent(data: unknown): string {
  const message = isRecord(data) ? data.message : undefined;
  if (isRecord(message)) {
    const toolCalls = message.tool_calls;
    const firstCall = Array.isArray(toolCalls) ? toolCalls[0] : undefined;
    const fn = isRecord(firstCall) ? firstCall.function : undefined;
    const args = isRecord(fn) ? fn.arguments : undefined;
    if (typeof args === "string") return args;
    if (isRecord(args)) return JSON.stringify(args);

    if (typeof message.content === "string") return message.content;
  }

  if (isRecord(data) && typeof data.response === "string") {
    return data.response;
  }
  throw new Error("Ollama endpoint returned an unexpected response shape.");
}

function ollamaOptions(
  settings: OllamaGenerationSettings | undefined,
): Record<string, number> {
  return {
    temperature: settings?.temperature ?? 0,
    top_p: settings?.topP ?? 0.9,
    top_k: settings?.topK ?? 40,
    min_p: settings?.minP ?? 0,
    repeat_penalty: settings?.repeatPenalty ?? 1.1,
    num_ctx: settings?.contextSize ?? 8192,
  };
}

function isToolRejection(error: unknown): boolean {
  if (!(error instanceof HttpError)) return false;
  const message = error.message.toLowerCase();
  return ["tool", "unsupported", "unknown field"].some((hint) =>
    message.includes(hint),
  );
}

async function runOpenAiChat(
  config: BackendConfig,
  messages: ChatMessage[],
  requestOptions?: ChatCompletionRequestOptions,
): Promise<string> {
  const data = await requestJson(config.baseUrl, openAiPaths("/chat/completions"), {
    method: "POST",
    headers: openAiHeaders(config.apiKey),
    body: JSON.stringify(
      buildOpenAiChatCompletionBody(config.model, messages, requestOptions),
    ),
  });
  return parseOpenAiContent(data);
}

async function runOllamaChat(
  config: BackendConfig,
  messages: ChatMessage[],
  requestOptions?: ChatCompletionRequestOptions,
): Promise<string> {
  const body: OllamaChatBody = {
    model: config.model,
    stream: false,
    messages: messages.map(toOllamaMessage),
    options: ollamaOptions(config.ollama),
  };
  if (requestOptions?.responseFormat === "json_object") {
    body.format = "json";
  }
  if (config.ollama?.useNativeToolCalling && requestOptions?.tool) {
    body.tools = [{ type: "function", function: requestOptions.tool }];
  }

  const post = (payload: OllamaChatBody) =>
    requestJson(config.baseUrl, ["/api/chat"], {
      method: "POST",
      headers: JSON_HEADERS,
      body: JSON.stringify(payload),
    });

  try {
    return parseOllamaContent(await post(body));
  } catch (error) {
    // Older models reject tool definitions; ask again with plain JSON mode.
    if (!body.tools || !isToolRejection(error)) throw error;
    const { tools: _tools, ...withoutTools } = body;
    return parseOllamaContent(await post(withoutTools));
  }
}

export async function runChatCompletion(
  config: BackendConfig,
  messages: ChatMessage[],
  requestOptions?: ChatCompletionRequestOptions,
): Promise<string> {
  if (!config.model.trim()) {
    throw new Error("Model is required.");
  }
  return config.kind === "openai"
    ? runOpenAiChat(config, messages, requestOptions)
    : runOllamaChat(config, messages, requestOptions);
}
