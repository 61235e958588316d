import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import { LLM_MODELS, GEMINI_MODELS, CLAUDE_MODELS } from "../config/models";
import { ProviderTimeoutError } from "../utils/errorHandler";

let _openai: OpenAI | null = null;
function getOpenAI(): OpenAI {
  if (!_openai) {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] OPENAI_API_KEY is not set");
    _openai = new OpenAI({ apiKey });
  }
  return _openai;
}

let _gemini: GoogleGenAI | null = null;
function getGemini(): GoogleGenAI {
  if (!_gemini) {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] GEMINI_API_KEY is not set");
    _gemini = new GoogleGenAI({ apiKey });
  }
  return _gemini;
}

let _claude: InstanceType<typeof import("@anthropic-ai/sdk").default> | null = null;
async function getClaude() {
  if (!_claude) {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] ANTHROPIC_API_KEY is not set");
    const Anthropic = (await import("@anthropic-ai/sdk")).default;
    _claude = new Anthropic({ apiKey });
  }
  return _claude;
}

const OPENAI_MODELS = new Set<string>(Object.values(LLM_MODELS));
const GEMINI_MODEL_SET = new Set<string>(Object.values(GEMINI_MODELS));
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

export type Provider = "openai" | "gemini" | "claude";

const API_KEY_VARS: Record<Provider, string> = {
  openai: "OPENAI_API_KEY",
  gemini: "GEMINI_API_KEY",
  claude: "ANTHROPIC_API_KEY",
};

export function detectProvider(model: string): Provider {
  if (OPENAI_MODELS.has(model)) return "openai";
  if (GEMINI_MODEL_SET.has(model)) return "gemini";
  if (CLAUDE_MODEL_SET.has(model)) return "claude";
  if (model.startsWith("gpt-") || model.startsWith("o1") || model.startsWith("o3")) return "openai";
  if (model.startsWith("gemini-")) return "gemini";
  if (model.startsWith("claude-")) return "claude";
  throw new Error(`[LLM Client] Unknown model "${model}", cannot determine provider. Add it to the model registry in server/config/models.ts`);
}

/**
 * Whether the credential for the model's provider is present.
 * Lets callers take their fallback path without attempting a call.
 */
export function isProviderConfigured(model: string): boolean {
  const provider = detectProvider(model);
  return Boolean(process.env[API_KEY_VARS[provider]]);
}

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Abort the request and reject with ProviderTimeoutError when the provider has not answered in time. */
  timeoutMs?: number;
};

export type LLMResponse = {
  text: string;
  provider: Provider;
  model: string;
};

export async function generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
  const provider = detectProvider(opts.model);
  if (opts.timeoutMs === undefined) {
    return dispatch(provider, opts);
  }

  const controller = new AbortController();
  return withTimeout(dispatch(provider, opts, controller.signal), opts.timeoutMs, provider, controller);
}

function dispatch(provider: Provider, opts: LLMRequestOptions, signal?: AbortSignal): Promise<LLMResponse> {
  switch (provider) {
    case "openai":
      return callOpenAI(opts, signal);
    case "gemini":
      return callGemini(opts, signal);
    case "claude":
      return callClaude(opts, signal);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
    }
  }
}

/**
 * Race the provider call against `timeoutMs`. On expiry the request is
 * aborted and the caller gets a ProviderTimeoutError.
 */
function withTimeout<T>(promise: Promise<T>, timeoutMs: number, provider: Provider, controller: AbortController): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ProviderTimeoutError(provider, timeoutMs));
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

async function callOpenAI(opts: LLMRequestOptions, signal?: AbortSignal): Promise<LLMResponse> {
  const response = await getOpenAI().chat.completions.create({
    model: opts.model,
    messages: opts.messages,
    ...(opts.temperature !== undefined && { temperature: opts.temperature }),
    ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
  }, { signal });

  return {
    text: response.choices[0]?.message?.content || "",
    provider: "openai",
    model: opts.model,
  };
}

async function callGemini(opts: LLMRequestOptions, signal?: AbortSignal): Promise<LLMResponse> {
  const systemParts = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content);

  const nonSystemMessages = opts.messages.filter(m => m.role !== "system");

  const contents = nonSystemMessages.map(m => ({
    role: m.role === "assistant" ? "model" as const : "user" as const,
    parts: [{ text: m.content }],
  }));

  const systemInstruction = systemParts.length > 0
    ? systemParts.join("\n\n")
    : undefined;

  const response = await getGemini().models.generateContent({
    model: opts.model,
    config: {
      ...(systemInstruction ? { systemInstruction } : {}),
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
      ...(signal ? { abortSignal: signal } : {}),
    },
    contents,
  });

  return {
    text: response.text || "",
    provider: "gemini",
    model: opts.model,
  };
}

async function callClaude(opts: LLMRequestOptions, signal?: AbortSignal): Promise<LLMResponse> {
  const client = await getClaude();

  const systemContent = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content)
    .join("\n\n");

  const nonSystemMessages = opts.messages.flatMap(m =>
    m.role === "system" ? [] : [{ role: m.role, content: m.content }],
  );

  const response = await client.messages.create({
    model: opts.model,
    max_tokens: opts.maxTokens || 4096,
    ...(systemContent ? { system: systemContent } : {}),
    messages: nonSystemMessages,
    ...(opts.temperature !== undefined && { temperature: opts.temperature }),
  }, { signal });

  const text = response.content
    .map(block => (block.type === "text" ? block.text : ""))
    .join("");

  return {
    text,
    provider: "claude",
    model: opts.model,
  };
}
