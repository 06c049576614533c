import { z } from 'zod';
import type {
  ChatCompletionRequest,
  FetchLike,
  GenerationParams,
  HttpResponse,
  ModelEndpointConfig,
  RequestInitLite,
} from '../../types/gateway.types';

export const defaultFetch: FetchLike = (input: string, init?: RequestInitLite): Promise<HttpResponse> => fetch(input, init);

export function buildChatRequest(
  endpoint: ModelEndpointConfig,
  prompt: string,
  params: GenerationParams,
  stream = false
): RequestInitLite & { body: string } {
  const payload: ChatCompletionRequest = {
    model: endpoint.model,
    messages: [{ role: 'user', content: prompt }],
    temperature: params.temperature,
    max_tokens: params.maxTokens,
    ...(stream ? { stream: true } : {}),
  };
  return {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${endpoint.apiKey}`,
      'Content-Type': 'application/json',
      ...(stream ? { 'Accept': 'text/event-stream' } : {}),
    },
    body: JSON.stringify(payload),
  };
}

/** 408, 429 and 5xx are worth another attempt; any other 4xx is not. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

export function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

export function extractCompletionText(raw: unknown): string | null {
  const parsed = ChatCompletionResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data.choices[0].message.content : null;
}

const ChatCompletionChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).optional(),
      })
    )
    .optional(),
  error: z.object({ message: z.string() }).optional(),
});

export type ChunkPayload = { token: string } | { error: string } | null;

/** Interprets one SSE `data:` payload from a streaming completion. */
export function parseChunkPayload(data: string): ChunkPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return { error: 'Malformed stream chunk from upstream' };
  }
  const parsed = ChatCompletionChunkSchema.safeParse(raw);
  if (!parsed.success) return { error: 'Unexpected stream chunk shape from upstream' };
  if (parsed.data.error) return { error: parsed.data.error.message };
  const token = parsed.data.choices?.[0]?.delta?.content;
  return token ? { token } : null;
}
