import { StreamingGateway } from '../../../services/streaming-gateway.service';
import { ModelCallPool } from '../../../services/model-call-pool.service';
import { LivenessRegistry } from '../../../services/liveness-registry.service';
import type { FetchLike, StreamEvent } from '../../../types/gateway.types';
import {
  DONE_CHUNK,
  errorResponse,
  mockFetch,
  sentRequest,
  sseReader,
  stallingReader,
  streamResponse,
  TEST_ENDPOINT,
  tokenChunk,
} from '../../test-utils/model-fetch';

function makeStreaming(fetchImpl: FetchLike, pool = new ModelCallPool({ maxConcurrent: 1, maxQueued: 0 })) {
  const liveness = new LivenessRegistry();
  const gateway = new StreamingGateway({
    subsystem: 'model',
    endpoint: TEST_ENDPOINT,
    generation: { temperature: 0.4, maxTokens: 256 },
    chunkTimeoutMs: 30,
    pool,
    liveness,
    fetchImpl,
  });
  return { gateway, liveness, pool };
}

/** Lets the limiter finish freeing a released slot. */
const settle = () => new Promise<void>((resolve) => setTimeout(resolve, 10));

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('StreamingGateway', () => {
  it('yields tokens in order followed by a completion marker', async () => {
    const { reader } = sseReader([tokenChunk('Hel'), tokenChunk('lo'), DONE_CHUNK]);
    const fetchImpl = mockFetch().mockResolvedValue(streamResponse(reader));
    const { gateway, liveness } = makeStreaming(fetchImpl);

    const events = await collect(gateway.stream('Say hello'));

    expect(events).toEqual([{ token: 'Hel' }, { token: 'lo' }, { status: 'complete' }]);
    expect(liveness.get('model')?.live).toBe(true);
    expect(sentRequest(fetchImpl.mock.calls[0][1])).toEqual({ prompt: 'Say hello', stream: true });
  });

  it('handles several events in one read and events split across reads', async () => {
    const whole = tokenChunk('a') + tokenChunk('b');
    const split = tokenChunk('c');
    const { reader } = sseReader([whole, split.slice(0, 10), split.slice(10), DONE_CHUNK]);
    const { gateway } = makeStreaming(mockFetch().mockResolvedValue(streamResponse(reader)));

    const events = await collect(gateway.stream('p'));

    expect(events).toEqual([{ token: 'a' }, { token: 'b' }, { token: 'c' }, { status: 'complete' }]);
  });

  it('completes when the body ends without a done marker', async () => {
    const { reader } = sseReader([tokenChunk('only')]);
    const { gateway } = makeStreaming(mockFetch().mockResolvedValue(streamResponse(reader)));

    await expect(collect(gateway.stream('p'))).resolves.toEqual([{ token: 'only' }, { status: 'complete' }]);
  });

  it('stops reading upstream once the consumer stops after N chunks', async () => {
    const { reader, read, cancel } = sseReader([
      tokenChunk('one'),
      tokenChunk('two'),
      tokenChunk('three'),
      tokenChunk('four'),
      DONE_CHUNK,
    ]);
    const fetchImpl = mockFetch().mockResolvedValue(streamResponse(reader));
    const { gateway, pool } = makeStreaming(fetchImpl);

    const received: StreamEvent[] = [];
    for await (const event of gateway.stream('p')) {
      received.push(event);
      if (received.length === 2) break;
    }

    expect(received).toEqual([{ token: 'one' }, { token: 'two' }]);
    expect(read).toHaveBeenCalledTimes(2);
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][1]?.signal?.aborted).toBe(true);
    // the single pool slot is free again
    await settle();
    await expect(pool.run(async () => 'free')).resolves.toBe('free');
  });

  it('stops without a terminal event when the caller aborts', async () => {
    const { reader, read, cancel } = stallingReader([tokenChunk('first')]);
    const { gateway, pool } = makeStreaming(mockFetch().mockResolvedValue(streamResponse(reader)));
    const abort = new AbortController();

    const stream = gateway.stream('p', { signal: abort.signal });
    await expect(stream.next()).resolves.toEqual({ done: false, value: { token: 'first' } });

    const pending = stream.next();
    await new Promise<void>((resolve) => setImmediate(resolve));
    abort.abort();

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(read).toHaveBeenCalledTimes(2);
    expect(cancel).toHaveBeenCalledTimes(1);
    await settle();
    await expect(pool.run(async () => 'free')).resolves.toBe('free');
  });

  it('ends with an error event when the upstream stalls', async () => {
    const { reader, cancel } = stallingReader([tokenChunk('partial')]);
    const { gateway } = makeStreaming(mockFetch().mockResolvedValue(streamResponse(reader)));

    const events = await collect(gateway.stream('p'));

    expect(events).toEqual([
      { token: 'partial' },
      { status: 'error', error: { code: 'GATEWAY_UNAVAILABLE', message: 'No data from model within 30ms' } },
    ]);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('turns an upstream error chunk into a terminal error event', async () => {
    const { reader } = sseReader([
      tokenChunk('a'),
      `data: ${JSON.stringify({ error: { message: 'model overloaded' } })}\n\n`,
      tokenChunk('never'),
    ]);
    const { gateway } = makeStreaming(mockFetch().mockResolvedValue(streamResponse(reader)));

    await expect(collect(gateway.stream('p'))).resolves.toEqual([
      { token: 'a' },
      { status: 'error', error: { code: 'GATEWAY_UNAVAILABLE', message: 'model overloaded' } },
    ]);
  });

  it('reports an HTTP failure as a single error event and marks auth failures down', async () => {
    const { gateway, liveness } = makeStreaming(mockFetch().mockResolvedValue(errorResponse(401, 'Unauthorized')));

    await expect(collect(gateway.stream('p'))).resolves.toEqual([
      { status: 'error', error: { code: 'GATEWAY_UNAVAILABLE', message: 'Model endpoint error: 401 Unauthorized' } },
    ]);
    expect(liveness.get('model')?.live).toBe(false);
  });

  it('never retries a failed stream', async () => {
    const fetchImpl = mockFetch().mockRejectedValue(new Error('connection refused'));
    const { gateway } = makeStreaming(fetchImpl);

    const events = await collect(gateway.stream('p'));

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(events).toEqual([
      { status: 'error', error: { code: 'GATEWAY_UNAVAILABLE', message: 'connection refused' } },
    ]);
  });

  it('refuses with a backpressure event when no slot is free', async () => {
    const pool = new ModelCallPool({ maxConcurrent: 1, maxQueued: 0 });
    const release = await pool.acquire();
    const fetchImpl = mockFetch();
    const { gateway } = makeStreaming(fetchImpl, pool);

    const events = await collect(gateway.stream('p'));

    expect(events).toEqual([
      { status: 'error', error: { code: 'BACKPRESSURE', message: 'Too many model calls in flight, retry later' } },
    ]);
    expect(fetchImpl).not.toHaveBeenCalled();
    release();
  });
});
