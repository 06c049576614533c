import { once } from 'events';
import type { NextFunction, Request, Response } from 'express';
import type { InterventionSubmission } from '../types/intervention.types';
import type { StreamEvent } from '../types/gateway.types';
import type { InterventionService } from '../services/intervention.service';
import { ok, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';
import { getTraceId } from '../middleware/trace-id.middleware';

/**
 * Resolves once the socket can take more, so the next upstream read waits on
 * a slow client. A disconnect ends the wait.
 */
async function writeEvent(res: Response, event: StreamEvent, disconnected: AbortSignal): Promise<void> {
  if (res.write(`data: ${JSON.stringify(event)}\n\n`)) return;
  try {
    await once(res, 'drain', { signal: disconnected });
  } catch (error) {
    if (!disconnected.aborted) throw error;
  }
}

export class InterventionController {
  constructor(private readonly service: InterventionService) {}

  /** POST /api/v1/interventions */
  async createPlan(req: Request, res: Response, next: NextFunction) {
    try {
      const submission: InterventionSubmission = req.body;
      const result = await this.service.generatePlan(submission);
      return ok(res, {
        plan: result.plan,
        aggregated_scores: result.aggregated,
        template_id: result.templateId,
        safety: {
          decision: result.verdict.decision,
          severity: result.verdict.severity,
          violations: result.verdict.violations.length,
        },
        gateway: { attempts: result.call.attempts, latency_ms: result.call.latencyMs },
      });
    } catch (error) {
      return next(error);
    }
  }

  /** POST /api/v1/interventions/stream (Server-Sent Events) */
  async streamPlan(req: Request, res: Response, next: NextFunction) {
    const submission: InterventionSubmission = req.body;
    const disconnect = new AbortController();

    let events: AsyncGenerator<StreamEvent, void, undefined>;
    try {
      events = this.service.streamPlan(submission, disconnect.signal);
    } catch (error) {
      // Template errors surface before any bytes are written
      return next(error);
    }

    res.on('close', () => {
      if (!res.writableEnded) disconnect.abort();
    });
    res.status(200).set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    try {
      for await (const event of events) {
        await writeEvent(res, event, disconnect.signal);
      }
    } catch (error) {
      logger.error('intervention:stream-failed', {
        requestId: getTraceId(res),
        error: error instanceof Error ? error.message : String(error),
      });
      if (!disconnect.signal.aborted) {
        res.write(
          `data: ${JSON.stringify({ status: 'error', error: { code: ErrorCodes.INTERNAL_ERROR, message: 'Stream failed' } })}\n\n`
        );
      }
    } finally {
      res.end();
    }
  }
}
