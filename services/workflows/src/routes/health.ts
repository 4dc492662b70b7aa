import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', { schema: { hide: true } }, async () => ({ status: 'ok' }));

  app.get('/readyz', { schema: { hide: true } }, async (request, reply) => {
    const { readiness } = ctx;
    const components: Record<string, boolean> = {
      repository: readiness.repository,
      templates: readiness.templates
    };

    for (const [component, ready] of Object.entries(components)) {
      ctx.metrics.readinessGauge.set({ component }, ready ? 1 : 0);
    }

    if (!Object.values(components).every(Boolean)) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', { schema: { hide: true } }, async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });

  app.get('/openapi.json', { schema: { hide: true } }, async () => app.swagger());
};
