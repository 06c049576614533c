import { EventEmitter } from 'events';
import type { Request, Response } from 'express';
import { InterventionController } from '../../../controllers/intervention.controller';
import { InterventionSubmissionSchema } from '../../../utils/zod-schemas/intervention.schema';
import { SUBMISSION_BODY } from '../../fixtures/intervention-plans';
import { makeRoot } from '../../test-utils/gateway-app';
import { DONE_CHUNK, mockFetch, sseReader, streamResponse, tokenChunk } from '../../test-utils/model-fetch';

/** Response whose socket buffer is always full: every write asks the caller to wait for 'drain'. */
class SlowClient extends EventEmitter {
  readonly chunks: string[] = [];
  writableEnded = false;
  statusCode = 0;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  set(_headers: Record<string, string>): this {
    return this;
  }

  flushHeaders(): void {}

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return false;
  }

  end(): this {
    this.writableEnded = true;
    return this;
  }
}

const settle = () => new Promise<void>((resolve) => setTimeout(resolve, 10));

function startStream(chunks: string[]) {
  const upstream = sseReader(chunks);
  const root = makeRoot(mockFetch().mockResolvedValue(streamResponse(upstream.reader)));
  const controller = new InterventionController(root.getInterventionService());
  const client = new SlowClient();
  const req = { body: InterventionSubmissionSchema.parse(SUBMISSION_BODY) } as Request;
  const next = jest.fn();
  const done = controller.streamPlan(req, client as unknown as Response, next);
  return { upstream, client, done, next };
}

describe('InterventionController.streamPlan', () => {
  it('reads upstream only as fast as the client drains', async () => {
    const { upstream, client, done } = startStream([
      tokenChunk('One.\n'),
      tokenChunk('Two.\n'),
      tokenChunk('Three.\n'),
      DONE_CHUNK,
    ]);

    await settle();
    expect(client.statusCode).toBe(200);
    expect(client.chunks).toEqual(['data: {"token":"One.\\n"}\n\n']);
    expect(upstream.read).toHaveBeenCalledTimes(1);

    client.emit('drain');
    await settle();
    expect(client.chunks).toHaveLength(2);
    expect(upstream.read).toHaveBeenCalledTimes(2);

    client.emit('drain');
    await settle();
    client.emit('drain');
    await settle();
    expect(client.chunks[3]).toBe('data: {"status":"complete"}\n\n');
    expect(client.writableEnded).toBe(false);

    client.emit('drain');
    await done;
    expect(client.chunks).toHaveLength(4);
    expect(client.writableEnded).toBe(true);
  });

  it('cancels the upstream when the client goes away while writes are blocked', async () => {
    const { upstream, client, done, next } = startStream([tokenChunk('One.\n'), tokenChunk('Two.\n'), DONE_CHUNK]);

    await settle();
    client.emit('close');
    await done;

    expect(client.chunks).toEqual(['data: {"token":"One.\\n"}\n\n']);
    expect(upstream.read).toHaveBeenCalledTimes(1);
    expect(upstream.cancel).toHaveBeenCalledTimes(1);
    expect(client.writableEnded).toBe(true);
    expect(next).not.toHaveBeenCalled();
  });
});
