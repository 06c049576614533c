import type express from 'express';
import { createApp } from '../../app';
import { CompositionRoot } from '../../app/composition-root';
import { loadAppConfig } from '../../config/app.config';
import type { FetchLike } from '../../types/gateway.types';
import { TEST_ENV } from './model-fetch';

/** Composition root wired to a fake model endpoint; retries never sleep. */
export function makeRoot(fetchImpl: FetchLike, env: Record<string, string> = {}): CompositionRoot {
  return new CompositionRoot(loadAppConfig({ ...TEST_ENV, ...env }), {
    fetchImpl,
    sleep: async () => undefined,
  });
}

export function makeApp(fetchImpl: FetchLike, env: Record<string, string> = {}): {
  app: express.Express;
  root: CompositionRoot;
} {
  const root = makeRoot(fetchImpl, env);
  return { app: createApp(root), root };
}
