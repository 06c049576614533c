/**
 * Model Gateway Types
 *
 * The upstream speaks the OpenAI-compatible chat completions dialect used by
 * hosted serving endpoints. Fetch is modelled locally so tests can inject it.
 */

export interface StreamReadResult {
  done: boolean;
  value?: Uint8Array;
}

export interface StreamReader {
  read(): Promise<StreamReadResult>;
  cancel(reason?: unknown): Promise<void>;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
  body?: { getReader(): StreamReader } | null;
}

export interface RequestInitLite {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchLike = (input: string, init?: RequestInitLite) => Promise<HttpResponse>;

export interface GenerationParams {
  temperature: number;
  maxTokens: number;
}

export interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
  temperature: number;
  max_tokens: number;
  stream?: boolean;
}

export type GatewayCallStatus = 'success' | 'exhausted' | 'fatal';

export interface GatewayCallResult {
  text: string;
  latencyMs: number;
  attempts: number;
  status: GatewayCallStatus;
  /** Last upstream failure; absent on success. */
  error?: { message: string; httpStatus?: number };
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export interface ModelEndpointConfig {
  provider: string;
  endpointUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export type StreamEvent =
  | { token: string }
  | { status: 'complete' }
  | { status: 'error'; error: { code: string; message: string } };
