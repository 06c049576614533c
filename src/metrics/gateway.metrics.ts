import * as client from 'prom-client';

function getOrCreateCounter<TLabelNames extends readonly string[]>(
  name: string,
  help: string,
  labelNames: TLabelNames
): client.Counter<TLabelNames[number]> {
  const existing = client.register.getSingleMetric(name) as client.Counter<TLabelNames[number]> | undefined;
  if (existing) {
    return existing;
  }
  return new client.Counter({ name, help, labelNames });
}

function getOrCreateHistogram<TLabelNames extends readonly string[]>(
  name: string,
  help: string,
  buckets: number[],
  labelNames: TLabelNames
): client.Histogram<TLabelNames[number]> {
  const existing = client.register.getSingleMetric(name) as client.Histogram<TLabelNames[number]> | undefined;
  if (existing) {
    return existing;
  }
  return new client.Histogram({ name, help, buckets, labelNames });
}

const LATENCY_BUCKETS = [100, 250, 500, 1000, 2000, 5000, 10000, 20000, 40000];

export function getModelCallLatencyHistogram() {
  return getOrCreateHistogram(
    'model_gateway_call_latency_ms',
    'End-to-end latency of a model gateway call across all attempts',
    LATENCY_BUCKETS,
    ['subsystem', 'status'] as const
  );
}

export function getModelCallAttemptsCounter() {
  return getOrCreateCounter(
    'model_gateway_attempts_total',
    'Upstream attempts made by the model gateway',
    ['subsystem', 'outcome'] as const
  );
}

export function getModelCallRejectedCounter() {
  return getOrCreateCounter(
    'model_gateway_backpressure_total',
    'Model calls refused because the call pool was saturated',
    [] as const
  );
}

export function getModelStreamCounter() {
  return getOrCreateCounter(
    'model_gateway_streams_total',
    'Streaming calls by terminal outcome',
    ['subsystem', 'outcome'] as const
  );
}

export function getSafetyDecisionCounter() {
  return getOrCreateCounter(
    'safety_guardrail_decisions_total',
    'Guardrail decisions by safety level, decision and overall severity',
    ['level', 'decision', 'severity'] as const
  );
}

export function getSchemaRepairCounter() {
  return getOrCreateCounter(
    'schema_validator_repairs_total',
    'Schema repair attempts by strategy and result',
    ['strategy', 'result'] as const
  );
}
