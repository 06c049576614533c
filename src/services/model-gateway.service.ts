/**
 * Model Gateway
 *
 * Synchronous completion calls to the hosted model:
 * - Sequential attempts with exponential backoff and jitter
 * - Per-attempt timeout; no end-to-end deadline beyond the attempt budget
 * - Transient (timeout, network, 408/429/5xx) vs fatal (other 4xx) failures
 * - Latency and attempt count recorded for every call, whatever the outcome
 * - Liveness written to the shared registry for the health monitor
 */

import type {
  FetchLike,
  GatewayCallResult,
  GatewayCallStatus,
  GenerationParams,
  ModelEndpointConfig,
  RetryPolicy,
} from '../types/gateway.types';
import { getModelCallAttemptsCounter, getModelCallLatencyHistogram } from '../metrics/gateway.metrics';
import { BackpressureError, GatewayTransientError, GatewayUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { LivenessRegistry } from './liveness-registry.service';
import type { ModelCallPool } from './model-call-pool.service';
import {
  buildChatRequest,
  defaultFetch,
  extractCompletionText,
  isAuthStatus,
  isTransientStatus,
} from './utils/model-endpoint.util';

/** Upstream refused the request outright (auth, malformed request). Never retried. */
class UpstreamRejectedError extends Error {
  constructor(message: string, public readonly httpStatus: number) {
    super(message);
    this.name = 'UpstreamRejectedError';
  }
}

export interface ModelGatewayOptions {
  /** Liveness key, e.g. 'model' or 'curriculum'. */
  subsystem: string;
  endpoint: ModelEndpointConfig;
  generation: GenerationParams;
  retry: RetryPolicy;
  pool: ModelCallPool;
  liveness: LivenessRegistry;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface InvokeOptions {
  maxAttempts?: number;
}

const PROBE_PROMPT = "Return the word 'healthy' if you are working.";

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    const t = setTimeout(resolve, ms);
    t.unref();
  });
}

export class ModelGateway {
  readonly subsystem: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly latency = getModelCallLatencyHistogram();
  private readonly attemptsCounter = getModelCallAttemptsCounter();

  constructor(private readonly options: ModelGatewayOptions) {
    this.subsystem = options.subsystem;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Runs the retry loop and reports the outcome. Upstream failures are
   * returned as a non-success status; only pool saturation throws.
   */
  async invoke(prompt: string, params?: Partial<GenerationParams>, invokeOptions: InvokeOptions = {}): Promise<GatewayCallResult> {
    const generation: GenerationParams = { ...this.options.generation, ...params };
    const maxAttempts = Math.max(1, invokeOptions.maxAttempts ?? this.options.retry.maxAttempts);
    const startedAt = this.now();
    let previousDelay = 0;
    let lastError: GatewayCallResult['error'];
    let status: GatewayCallStatus = 'exhausted';
    let attempts = 0;

    while (attempts < maxAttempts) {
      attempts++;
      try {
        const text = await this.options.pool.run(() => this.attempt(prompt, generation));
        this.attemptsCounter.inc({ subsystem: this.subsystem, outcome: 'success' });
        return this.finish({ text, attempts, status: 'success', latencyMs: this.now() - startedAt });
      } catch (error) {
        if (error instanceof BackpressureError) throw error;

        if (error instanceof GatewayTransientError) {
          lastError = { message: error.message, ...(error.httpStatus ? { httpStatus: error.httpStatus } : {}) };
          this.attemptsCounter.inc({ subsystem: this.subsystem, outcome: 'transient' });
        } else {
          const httpStatus = error instanceof UpstreamRejectedError ? error.httpStatus : undefined;
          lastError = { message: error instanceof Error ? error.message : String(error), ...(httpStatus ? { httpStatus } : {}) };
          this.attemptsCounter.inc({ subsystem: this.subsystem, outcome: 'fatal' });
          status = 'fatal';
          break;
        }

        if (attempts < maxAttempts) {
          const delay = this.backoffDelay(attempts, previousDelay);
          previousDelay = delay;
          logger.warn('model-gateway:retry', {
            subsystem: this.subsystem,
            attempt: attempts,
            maxAttempts,
            delayMs: delay,
            error: lastError.message,
          });
          await this.sleep(delay);
        }
      }
    }

    return this.finish({
      text: '',
      attempts,
      status,
      latencyMs: this.now() - startedAt,
      ...(lastError ? { error: lastError } : {}),
    });
  }

  /** Like invoke, but anything other than success surfaces as GatewayUnavailableError. */
  async complete(prompt: string, params?: Partial<GenerationParams>): Promise<GatewayCallResult> {
    const result = await this.invoke(prompt, params);
    if (result.status !== 'success') {
      throw new GatewayUnavailableError(this.subsystem, result);
    }
    return result;
  }

  /** Single-attempt liveness probe. Never throws. */
  async probe(): Promise<boolean> {
    try {
      const result = await this.invoke(PROBE_PROMPT, { temperature: 0, maxTokens: 5 }, { maxAttempts: 1 });
      if (result.status !== 'success') {
        this.options.liveness.markDown(this.subsystem, result.error?.message);
        return false;
      }
      if (!result.text.toLowerCase().includes('healthy')) {
        this.options.liveness.markDown(this.subsystem, 'unexpected probe reply');
        return false;
      }
      return true;
    } catch (error) {
      logger.warn('model-gateway:probe-skipped', {
        subsystem: this.subsystem,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.options.liveness.get(this.subsystem)?.live ?? false;
    }
  }

  /**
   * Exponential backoff with additive jitter, never decreasing and never above
   * maxDelayMs. The deterministic part stops at half the cap so the random part
   * keeps room below it on later retries.
   */
  backoffDelay(attempt: number, previousDelay: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.options.retry;
    const exponential = baseDelayMs * Math.pow(2, attempt - 1);
    if (!jitter) return Math.round(Math.max(previousDelay, Math.min(maxDelayMs, exponential)));
    const floor = Math.min(maxDelayMs, Math.max(previousDelay, Math.min(maxDelayMs / 2, exponential)));
    const span = Math.min(exponential, maxDelayMs - floor);
    return Math.round(floor + this.random() * span);
  }

  private async attempt(prompt: string, params: GenerationParams): Promise<string> {
    const { endpoint } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), endpoint.timeoutMs);
    timer.unref();

    try {
      const response = await this.fetchImpl(endpoint.endpointUrl, {
        ...buildChatRequest(endpoint, prompt, params),
        signal: controller.signal,
      });
      if (!response.ok) {
        const message = `Model endpoint error: ${response.status} ${response.statusText}`;
        if (isTransientStatus(response.status)) throw new GatewayTransientError(message, response.status);
        throw new UpstreamRejectedError(message, response.status);
      }
      const text = extractCompletionText(await response.json());
      if (text === null) {
        throw new GatewayTransientError('Model endpoint returned no completion text');
      }
      return text;
    } catch (error) {
      if (error instanceof GatewayTransientError || error instanceof UpstreamRejectedError) throw error;
      if (controller.signal.aborted) {
        throw new GatewayTransientError(`Request timed out after ${endpoint.timeoutMs}ms`);
      }
      throw new GatewayTransientError(`Network error: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private finish(result: GatewayCallResult): GatewayCallResult {
    this.latency.observe({ subsystem: this.subsystem, status: result.status }, result.latencyMs);
    if (result.status === 'success') {
      this.options.liveness.markLive(this.subsystem);
    } else if (result.status === 'exhausted') {
      this.options.liveness.markDown(this.subsystem, result.error?.message);
    } else if (result.error?.httpStatus !== undefined && isAuthStatus(result.error.httpStatus)) {
      this.options.liveness.markDown(this.subsystem, 'authentication rejected');
    }

    const log = result.status === 'success' ? logger.info : logger.error;
    log('model-gateway:call', {
      subsystem: this.subsystem,
      provider: this.options.endpoint.provider,
      status: result.status,
      attempts: result.attempts,
      latencyMs: result.latencyMs,
      ...(result.error ? { error: result.error.message } : {}),
    });
    return result;
  }
}
