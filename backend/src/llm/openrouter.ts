// OpenRouter Provider Adapter
// OpenRouter exposes an OpenAI-compatible /chat/completions endpoint.

import { z } from "zod";
import type { FinishReason, ProviderAdapter, Request, Response } from "./client.js";
import { SDKError } from "./client.js";

const CompletionSchema = z.object({
  id: z.string(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

function parseFinishReason(reason: string | null | undefined): FinishReason {
  const map: Record<string, FinishReason["reason"]> = {
    stop: "stop",
    length: "length",
    content_filter: "content_filter",
  };
  if (!reason) return { reason: "other" };
  return { reason: map[reason] ?? "other", raw: reason };
}

export class OpenRouterAdapter implements ProviderAdapter {
  readonly name = "openrouter";

  constructor(
    private apiKey: string,
    private baseUrl: string = "https://openrouter.ai/api/v1",
  ) {}

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "Content-Type": "application/json",
      "X-Title": "heor-flow",
    };
  }

  buildBody(request: Request): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: request.messages.map((msg) => ({
        role: msg.role,
        content: msg.content.map((p) => p.text).join("\n"),
      })),
      stream: false,
    };

    if (request.maxTokens) body.max_tokens = request.maxTokens;
    if (request.temperature != null) body.temperature = request.temperature;
    if (request.responseFormat?.type === "json") body.response_format = { type: "json_object" };

    return body;
  }

  async complete(request: Request): Promise<Response> {
    const res = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(this.buildBody(request)),
    });

    if (!res.ok) {
      const errText = await res.text();
      throw new SDKError(
        `OpenRouter API error ${res.status}: ${errText}`,
        res.status,
        "openrouter",
        res.status === 429 || res.status >= 500,
      );
    }

    const parsed = CompletionSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new SDKError(`OpenRouter returned an unexpected body: ${parsed.error.message}`, res.status, "openrouter");
    }
    const data = parsed.data;
    const choice = data.choices[0];

    return {
      id: data.id,
      model: data.model ?? request.model,
      provider: "openrouter",
      message: { role: "assistant", content: [{ kind: "text", text: choice.message.content ?? "" }] },
      finishReason: parseFinishReason(choice.finish_reason),
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
    };
  }
}
