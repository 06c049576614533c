/**
 * Streaming Gateway
 *
 * Token streaming from the same model endpoint, as a lazy async generator.
 * Reads upstream only when the consumer asks for the next event, so a consumer
 * that stops pulling stops the upstream read. Cancellation (generator return()
 * or an aborted signal) cancels the reader, aborts the request and frees the
 * pool slot. Failures end the stream with one terminal error event; streams are
 * never retried here.
 */

import type {
  FetchLike,
  GenerationParams,
  ModelEndpointConfig,
  StreamEvent,
  StreamReader,
} from '../types/gateway.types';
import { ErrorCodes } from '../types/api.types';
import { getModelStreamCounter } from '../metrics/gateway.metrics';
import { BackpressureError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { LivenessRegistry } from './liveness-registry.service';
import type { ModelCallPool } from './model-call-pool.service';
import { buildChatRequest, defaultFetch, isAuthStatus, parseChunkPayload } from './utils/model-endpoint.util';

export interface StreamingGatewayOptions {
  subsystem: string;
  endpoint: ModelEndpointConfig;
  generation: GenerationParams;
  /** Upper bound on the wait for any single upstream read, first one included. */
  chunkTimeoutMs: number;
  pool: ModelCallPool;
  liveness: LivenessRegistry;
  fetchImpl?: FetchLike;
}

export interface StreamOptions {
  signal?: AbortSignal;
  params?: Partial<GenerationParams>;
}

type StreamOutcome = 'complete' | 'error' | 'cancelled';

class StreamFailure extends Error {
  constructor(message: string, public readonly httpStatus?: number) {
    super(message);
    this.name = 'StreamFailure';
  }
}

const ABORTED = Symbol('aborted');

function errorEvent(code: string, message: string): StreamEvent {
  return { status: 'error', error: { code, message } };
}

export class StreamingGateway {
  private readonly fetchImpl: FetchLike;
  private readonly streams = getModelStreamCounter();

  constructor(private readonly options: StreamingGatewayOptions) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  async *stream(prompt: string, streamOptions: StreamOptions = {}): AsyncGenerator<StreamEvent, void, undefined> {
    const { signal } = streamOptions;
    if (signal?.aborted) return;

    let release: () => void;
    try {
      release = await this.options.pool.acquire();
    } catch (error) {
      if (error instanceof BackpressureError) {
        this.record('error', { reason: 'backpressure' });
        yield errorEvent(error.code, error.message);
        return;
      }
      throw error;
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const startedAt = Date.now();
    let reader: StreamReader | undefined;
    let outcome: StreamOutcome = 'cancelled';
    let tokens = 0;

    try {
      const response = await this.withChunkTimeout(
        () =>
          this.fetchImpl(this.options.endpoint.endpointUrl, {
            ...buildChatRequest(this.options.endpoint, prompt, { ...this.options.generation, ...streamOptions.params }, true),
            signal: controller.signal,
          }),
        controller.signal
      );
      if (response === ABORTED) return;
      if (!response.ok) {
        throw new StreamFailure(`Model endpoint error: ${response.status} ${response.statusText}`, response.status);
      }
      if (!response.body) {
        throw new StreamFailure('Model endpoint returned no stream body');
      }
      const upstream = response.body.getReader();
      reader = upstream;

      const decoder = new TextDecoder();
      let buffer = '';
      let ended = false;

      for (;;) {
        const newline = buffer.indexOf('\n');
        if (newline === -1) {
          if (ended) break;
          const chunk = await this.withChunkTimeout(() => upstream.read(), controller.signal);
          if (chunk === ABORTED) return;
          if (chunk.done) {
            // Body ended without [DONE]; flush whatever is left as a final line
            buffer += decoder.decode() + '\n';
            ended = true;
            continue;
          }
          buffer += decoder.decode(chunk.value, { stream: true });
          continue;
        }

        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        if (!line.startsWith('data:')) continue;

        const data = line.slice('data:'.length).trim();
        if (data === '[DONE]') break;

        const payload = parseChunkPayload(data);
        if (payload === null) continue;
        if ('error' in payload) throw new StreamFailure(payload.error);

        tokens++;
        yield { token: payload.token };
      }

      outcome = 'complete';
      this.options.liveness.markLive(this.options.subsystem);
      yield { status: 'complete' };
    } catch (error) {
      if (signal?.aborted) return;
      outcome = 'error';
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof StreamFailure && error.httpStatus !== undefined && isAuthStatus(error.httpStatus)) {
        this.options.liveness.markDown(this.options.subsystem, 'authentication rejected');
      }
      yield errorEvent(ErrorCodes.GATEWAY_UNAVAILABLE, message);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (reader) {
        try {
          await reader.cancel();
        } catch (cancelError) {
          logger.debug('streaming-gateway:cancel-failed', {
            error: cancelError instanceof Error ? cancelError.message : String(cancelError),
          });
        }
      }
      controller.abort();
      release();
      this.record(outcome, { tokens, durationMs: Date.now() - startedAt });
    }
  }

  /**
   * Starts one upstream wait unless already cancelled, and races it against the
   * chunk timeout and cancellation. Resolves to ABORTED when cancelled.
   */
  private withChunkTimeout<T>(start: () => Promise<T>, abortSignal: AbortSignal): Promise<T | typeof ABORTED> {
    if (abortSignal.aborted) return Promise.resolve(ABORTED);
    const pending = start();
    const { chunkTimeoutMs } = this.options;
    return new Promise<T | typeof ABORTED>((resolve, reject) => {
      const onAbort = () => {
        cleanup();
        resolve(ABORTED);
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new StreamFailure(`No data from model within ${chunkTimeoutMs}ms`));
      }, chunkTimeoutMs);
      timer.unref();
      const cleanup = () => {
        clearTimeout(timer);
        abortSignal.removeEventListener('abort', onAbort);
      };
      abortSignal.addEventListener('abort', onAbort, { once: true });
      pending.then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  }

  private record(outcome: StreamOutcome, context: Record<string, unknown>): void {
    this.streams.inc({ subsystem: this.options.subsystem, outcome });
    const log = outcome === 'error' ? logger.warn : logger.info;
    log('streaming-gateway:stream', { subsystem: this.options.subsystem, outcome, ...context });
  }
}
