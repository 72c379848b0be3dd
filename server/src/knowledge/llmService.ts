/**
 * LLM Service - Unified interface for OpenAI and Anthropic
 *
 * Provides a single completion API for knowledge lookups with:
 * - Automatic fallback between providers
 * - Retry logic with exponential backoff
 */

import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export type LLMProvider = "openai" | "anthropic";

export interface LLMConfig {
  provider: LLMProvider | "auto";
  model?: string;
  temperature: number;
  maxTokens: number;
  retryCount: number;
  retryDelay: number;
}

const DEFAULT_CONFIG: LLMConfig = {
  provider: "auto",
  temperature: 0.3,
  maxTokens: 50,
  retryCount: 2,
  retryDelay: 500,
};

const OPENAI_MODELS = {
  default: "gpt-4o-mini",
} as const;

const ANTHROPIC_MODELS = {
  default: "claude-haiku-4-5",
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// LLM CLIENTS (Lazy initialization)
// ═══════════════════════════════════════════════════════════════════════════════

let openaiClient: OpenAI | null = null;
let anthropicClient: Anthropic | null = null;

function getOpenAIClient(): OpenAI | null {
  if (!process.env.OPENAI_API_KEY) {
    console.warn("[LLM] OpenAI API key not configured");
    return null;
  }
  if (!openaiClient) {
    openaiClient = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  }
  return openaiClient;
}

function getAnthropicClient(): Anthropic | null {
  if (!process.env.ANTHROPIC_API_KEY) {
    console.warn("[LLM] Anthropic API key not configured");
    return null;
  }
  if (!anthropicClient) {
    anthropicClient = new Anthropic({ apiKey: process.env.ANTHROPIC_API_KEY });
  }
  return anthropicClient;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST/RESPONSE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

interface ConversationMessage extends LLMMessage {
  role: "user" | "assistant";
}

export interface LLMRequest {
  messages: LLMMessage[];
  config?: Partial<LLMConfig>;
}

export interface LLMResponse {
  content: string;
  provider: LLMProvider;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  latencyMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CORE LLM FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Main entry point for LLM completions
 */
export async function complete(request: LLMRequest): Promise<LLMResponse> {
  const config: LLMConfig = { ...DEFAULT_CONFIG, ...request.config };
  const startTime = Date.now();
  let lastError: unknown = null;

  const providers = getProviderOrder(config.provider);

  for (const provider of providers) {
    for (let attempt = 0; attempt < config.retryCount; attempt++) {
      try {
        const response = await executeCompletion(provider, request, config);
        return { ...response, latencyMs: Date.now() - startTime };
      } catch (error: unknown) {
        lastError = error;
        console.warn(
          `[LLM] ${provider} attempt ${attempt + 1} failed:`,
          error instanceof Error ? error.message : String(error),
        );

        if (attempt < config.retryCount - 1) {
          await sleep(config.retryDelay * Math.pow(2, attempt));
        }
      }
    }
  }

  throw lastError ?? new Error("All LLM providers failed");
}

/** Which providers have keys configured; makes no network call. */
export function getLLMAvailability(env: NodeJS.ProcessEnv = process.env): Record<LLMProvider, boolean> {
  return {
    openai: Boolean(env.OPENAI_API_KEY),
    anthropic: Boolean(env.ANTHROPIC_API_KEY),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTERNAL HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Preferred provider first when its key is set, then the other keyed one.
 * "auto", or a preference without a key, tries OpenAI before Anthropic.
 */
export function getProviderOrder(
  preference: LLMConfig["provider"],
  env: NodeJS.ProcessEnv = process.env,
): LLMProvider[] {
  const { openai: openaiAvailable, anthropic: anthropicAvailable } = getLLMAvailability(env);

  if (preference === "openai" && openaiAvailable) {
    return anthropicAvailable ? ["openai", "anthropic"] : ["openai"];
  }
  if (preference === "anthropic" && anthropicAvailable) {
    return openaiAvailable ? ["anthropic", "openai"] : ["anthropic"];
  }

  const order: LLMProvider[] = [];
  if (openaiAvailable) order.push("openai");
  if (anthropicAvailable) order.push("anthropic");

  if (order.length === 0) {
    throw new Error("No LLM provider configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY in .env");
  }
  return order;
}

async function executeCompletion(
  provider: LLMProvider,
  request: LLMRequest,
  config: LLMConfig,
): Promise<Omit<LLMResponse, "latencyMs">> {
  if (provider === "openai") {
    return executeOpenAI(request, config);
  }
  return executeAnthropic(request, config);
}

async function executeOpenAI(request: LLMRequest, config: LLMConfig): Promise<Omit<LLMResponse, "latencyMs">> {
  const client = getOpenAIClient();
  if (!client) throw new Error("OpenAI client not available");

  const model = config.model?.startsWith("gpt") ? config.model : OPENAI_MODELS.default;

  const response = await client.chat.completions.create({
    model,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    temperature: config.temperature,
    max_tokens: config.maxTokens,
  });

  const choice = response.choices[0];
  return {
    content: choice?.message.content ?? "",
    provider: "openai",
    model: response.model,
    usage: {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    },
  };
}

function isConversationMessage(message: LLMMessage): message is ConversationMessage {
  return message.role !== "system";
}

async function executeAnthropic(request: LLMRequest, config: LLMConfig): Promise<Omit<LLMResponse, "latencyMs">> {
  const client = getAnthropicClient();
  if (!client) throw new Error("Anthropic client not available");

  const model = config.model?.startsWith("claude") ? config.model : ANTHROPIC_MODELS.default;

  // Extract system message
  const systemMessage = request.messages.find((m) => m.role === "system");
  const conversation = request.messages.filter(isConversationMessage);

  const response = await client.messages.create({
    model,
    max_tokens: config.maxTokens,
    temperature: config.temperature,
    ...(systemMessage ? { system: systemMessage.content } : {}),
    messages: conversation.map((m) => ({ role: m.role, content: m.content })),
  });

  const textContent = response.content.find((c) => c.type === "text");

  return {
    content: textContent?.type === "text" ? textContent.text : "",
    provider: "anthropic",
    model: response.model,
    usage: {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    },
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
