import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import type { Context } from 'hono';
import type { PipelineRunner } from './orchestrator';
import { describeError, toError } from './utils/errors';
import type { Logger } from './utils/logger';

export interface AppContext {
  runPipeline: PipelineRunner;
  logger: Logger;
}

/**
 * HTTP trigger for the scheduler. Any success status means the core tables are fresh;
 * callers check `analytics_errors` for metrics completeness.
 */
export function createApp(ctx: AppContext): Hono {
  const app = new Hono();
  const logger = ctx.logger.child({ service: 'http' });

  const trigger = async (c: Context) => {
    const runId = c.req.query('run_id') ?? c.req.header('x-run-id');
    const summary = await ctx.runPipeline(runId);
    return c.json(summary, summary.status === 'DONE' ? 200 : 500);
  };

  app.get('/healthz', (c) => c.json({ status: 'ok' }));
  app.post('/', trigger);
  app.get('/', trigger);

  app.onError((err, c) => {
    logger.error('Unhandled error', toError(err), { path: c.req.path });
    return c.json({ status: 'FAILED', error: describeError(err) }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

export interface ServerHandle {
  close(): Promise<void>;
}

export function startServer(ctx: AppContext, port: number): ServerHandle {
  const app = createApp(ctx);
  const server = serve({ fetch: app.fetch, port }, (info) => {
    ctx.logger.info('Snapshot trigger listening', { port: info.port });
  });

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
