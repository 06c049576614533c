import Bottleneck from 'bottleneck';
import { getModelCallRejectedCounter } from '../metrics/gateway.metrics';
import { BackpressureError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ModelCallPoolOptions {
  /** Upstream calls allowed in flight at once. */
  maxConcurrent: number;
  /** Callers allowed to wait for a slot; one more fails fast with BackpressureError. */
  maxQueued: number;
}

/**
 * Per-process bound on outstanding model calls, shared by the synchronous and
 * streaming gateways. Policy: queue up to maxQueued, then fail fast.
 */
export class ModelCallPool {
  private readonly limiter: Bottleneck;
  private readonly rejected = getModelCallRejectedCounter();

  constructor(private readonly options: ModelCallPoolOptions) {
    this.limiter = new Bottleneck({
      maxConcurrent: options.maxConcurrent,
      highWater: options.maxQueued,
      strategy: Bottleneck.strategy.OVERFLOW,
      minTime: 0,
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await this.limiter.schedule(task);
    } catch (error) {
      if (error instanceof Bottleneck.BottleneckError) {
        this.rejected.inc();
        logger.warn('model-call-pool:saturated', {
          maxConcurrent: this.options.maxConcurrent,
          maxQueued: this.options.maxQueued,
        });
        throw new BackpressureError();
      }
      throw error;
    }
  }

  /**
   * Holds a slot until the returned release function is called. Used by
   * streams, whose lifetime is not a single promise.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolveAcquired, rejectAcquired) => {
      let release: () => void = () => undefined;
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });
      this.run(async () => {
        resolveAcquired(release);
        await held;
      }).catch(rejectAcquired);
    });
  }

  async stop(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: true });
  }
}
