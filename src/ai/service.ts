/**
 * AI Service Implementation
 *
 * Provides a unified interface for AI completions across providers.
 * Supports Anthropic Claude and OpenAI GPT models, plus a mock provider
 * that answers locally.
 */

import { z } from "zod";

import { boundedTimeout } from "../lib/timeout.js";

import type {
  AIConfig,
  AIProvider,
  AIResponse,
  CompletionRequest,
  TokenUsage,
} from "./types.js";

const DEFAULT_CONFIG: Required<AIConfig> = {
  provider: "anthropic",
  apiKey: "",
  model: "claude-sonnet-4-20250514",
  maxTokens: 4096,
  temperature: 0.2,
  timeoutMs: 60000,
};

const PROVIDER_MODELS: Record<AIProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o",
  mock: "mock-model",
};

const PROVIDER_ENDPOINTS: Record<AIProvider, string> = {
  anthropic: "https://api.anthropic.com/v1/messages",
  openai: "https://api.openai.com/v1/chat/completions",
  mock: "",
};

const PROVIDER_ENV_VARS: Record<AIProvider, string | undefined> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  mock: undefined,
};

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

const OpenAIResponseSchema = z.object({
  choices: z.array(
    z.object({ message: z.object({ content: z.string().nullable().optional() }) })
  ),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

interface ProviderReply {
  content: string;
  usage?: TokenUsage;
}

/**
 * AI Service for generating completions
 */
export class AIService {
  private readonly config: Required<AIConfig>;

  constructor(config: Partial<AIConfig> = {}) {
    const provider = config.provider ?? DEFAULT_CONFIG.provider;
    this.config = {
      provider,
      apiKey: config.apiKey ?? this.getApiKeyFromEnv(provider),
      model: config.model ?? PROVIDER_MODELS[provider],
      maxTokens: config.maxTokens ?? DEFAULT_CONFIG.maxTokens,
      temperature: config.temperature ?? DEFAULT_CONFIG.temperature,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    };
  }

  /**
   * Get API key from environment variable
   */
  private getApiKeyFromEnv(provider: AIProvider): string {
    const envVar = PROVIDER_ENV_VARS[provider];
    if (envVar === undefined) return "mock-key";
    return process.env[envVar] ?? "";
  }

  /**
   * Check if the service is configured with an API key
   */
  isConfigured(): boolean {
    return this.config.provider === "mock" || this.config.apiKey.length > 0;
  }

  getProvider(): AIProvider {
    return this.config.provider;
  }

  getModel(): string {
    return this.config.model;
  }

  /**
   * Generate a completion.
   *
   * Never throws: transport errors, HTTP errors, malformed bodies, timeouts
   * and caller aborts all come back as `{ success: false }`.
   */
  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<AIResponse<string>> {
    const startTime = Date.now();

    if (!this.isConfigured()) {
      const envVar = PROVIDER_ENV_VARS[this.config.provider] ?? "an API key";
      return {
        success: false,
        error: `API key not configured for ${this.config.provider}. Set ${envVar} or run \`apexcov config set ${this.config.provider}-api-key <key>\`.`,
        durationMs: Date.now() - startTime,
      };
    }

    if (signal?.aborted) {
      return { success: false, error: "Request aborted", durationMs: 0 };
    }

    if (this.config.provider === "mock") {
      return this.mockComplete(request, startTime);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), boundedTimeout(this.config.timeoutMs));
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const reply = this.config.provider === "anthropic"
        ? await this.callAnthropic(request, controller.signal)
        : await this.callOpenAI(request, controller.signal);

      const response: AIResponse<string> = {
        success: true,
        data: reply.content,
        durationMs: Date.now() - startTime,
      };
      if (reply.usage) {
        response.usage = reply.usage;
      }
      return response;
    } catch (error) {
      let message = error instanceof Error ? error.message : "Unknown error";
      if (controller.signal.aborted) {
        message = signal?.aborted
          ? "Request aborted"
          : `Request timed out after ${this.config.timeoutMs}ms`;
      }
      return {
        success: false,
        error: message,
        durationMs: Date.now() - startTime,
      };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const response = await fetch(PROVIDER_ENDPOINTS.anthropic, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: request.systemPrompt,
        messages: request.messages,
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Anthropic API error: ${response.status} - ${error}`);
    }

    const parsed = AnthropicResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Anthropic response: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
    }

    const text = parsed.data.content
      .map((block) => block.text ?? "")
      .join("");
    const usage = parsed.data.usage;

    return {
      content: text,
      ...(usage && { usage: { inputTokens: usage.input_tokens, outputTokens: usage.output_tokens } }),
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const messages: Array<{ role: string; content: string }> = [];

    if (request.systemPrompt !== undefined && request.systemPrompt.length > 0) {
      messages.push({ role: "system", content: request.systemPrompt });
    }

    for (const m of request.messages) {
      messages.push({ role: m.role, content: m.content });
    }

    const response = await fetch(PROVIDER_ENDPOINTS.openai, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        messages,
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${error}`);
    }

    const parsed = OpenAIResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected OpenAI response: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
    }

    const usage = parsed.data.usage;
    return {
      content: parsed.data.choices[0]?.message.content ?? "",
      ...(usage && { usage: { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens } }),
    };
  }

  /**
   * Mock completion: a minimal test class for the class named in the prompt
   */
  private mockComplete(request: CompletionRequest, startTime: number): AIResponse<string> {
    const lastMessage = request.messages[request.messages.length - 1];
    const content = lastMessage?.content ?? "";

    const testName = /^Test class name: (\w+)$/m.exec(content)?.[1] ?? "GeneratedTest";
    const className = /^Class under test: (\w+)$/m.exec(content)?.[1] ?? "Subject";

    const body = [
      "@isTest",
      `private class ${testName} {`,
      "    @isTest",
      "    static void constructsInstance() {",
      "        Test.startTest();",
      `        Object subject = Type.forName('${className}');`,
      "        Test.stopTest();",
      "        System.assertNotEquals(null, subject);",
      "    }",
      "}",
    ].join("\n");

    return {
      success: true,
      data: body,
      usage: { inputTokens: Math.ceil(content.length / 4), outputTokens: Math.ceil(body.length / 4) },
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Create an AI service instance
 */
export function createAIService(config?: Partial<AIConfig>): AIService {
  return new AIService(config);
}
