import { existsSync } from 'node:fs';
import path from 'node:path';

import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import fastify, { type FastifyInstance } from 'fastify';

import { DEFAULT_TEMPLATES_DIR, LiquidHtmlRenderer, hypermediaPlugin } from '@cjkit/hypermedia';

import { identityPlugin } from './auth';
import type { WorkflowsConfig } from './config';
import { InMemoryWorkflowRepository } from './domain/repository';
import { seedDemoData } from './domain/seed';
import { WorkflowService } from './domain/service';
import type { WorkflowServiceOptions } from './domain/service';
import { mapErrorToResponse, toDocumentError } from './errors';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerHealthRoutes } from './routes/health';
import { respond } from './routes/respond';
import { registerRootRoutes } from './routes/root';
import { registerWorkflowDefinitionRoutes } from './routes/workflowDefinitions';
import { registerWorkflowInstanceRoutes } from './routes/workflowInstances';
import type { AppContext } from './types';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export interface CreateAppOptions {
  service?: WorkflowServiceOptions;
}

export const createApp = async (config: WorkflowsConfig, options: CreateAppOptions = {}): Promise<CreateAppResult> => {
  const logger = createLogger(config.logLevel);
  const app = fastify({
    logger,
    ajv: { customOptions: { keywords: ['x-render-hint'] } }
  });
  await app.register(cors, { origin: true, credentials: true });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'repository' }, 0);
  metrics.readinessGauge.set({ component: 'templates' }, 0);

  const templatesDir = config.templatesDir ? path.resolve(process.cwd(), config.templatesDir) : DEFAULT_TEMPLATES_DIR;
  const readiness = {
    repository: false,
    templates: existsSync(path.join(templatesDir, 'collection.liquid'))
  };
  if (!readiness.templates) {
    app.log.warn({ templatesDir }, 'HTML templates not found');
  }
  metrics.readinessGauge.set({ component: 'templates' }, readiness.templates ? 1 : 0);

  const service = new WorkflowService(new InMemoryWorkflowRepository(), options.service);
  if (config.seedDemo) {
    await seedDemoData(service, config.demoUserId);
  }
  readiness.repository = true;
  metrics.readinessGauge.set({ component: 'repository' }, 1);

  const ctx: AppContext = {
    config,
    service,
    metrics,
    readiness
  };

  app.addContentTypeParser('application/x-www-form-urlencoded', { parseAs: 'string' }, (_request, body, done) => {
    const text = typeof body === 'string' ? body : body.toString('utf8');
    done(null, Object.fromEntries(new URLSearchParams(text)));
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Workflows',
        version: '0.1.0',
        description: 'Workflow definitions and instances served as Collection+JSON'
      }
    }
  });
  await app.register(swaggerUi, { routePrefix: '/docs' });
  await app.register(hypermediaPlugin, {
    renderer: new LiquidHtmlRenderer({ templatesDir })
  });
  await app.register(identityPlugin, {
    identity: { userId: config.demoUserId, username: config.demoUsername }
  });

  app.setErrorHandler(async (error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    const document = app.hypermedia.forRequest(request).buildDocument({
      title: 'Error',
      links: ['home'],
      error: toDocumentError(mapped)
    });
    return respond(ctx, request, reply, document, mapped.statusCode);
  });

  app.setNotFoundHandler(async (request, reply) => {
    const document = app.hypermedia.forRequest(request).buildDocument({
      title: 'Not Found',
      links: ['home'],
      error: { title: 'not_found', code: 404, message: `Route ${request.method} ${request.url} not found` }
    });
    return respond(ctx, request, reply, document, 404);
  });

  app.addHook('onClose', async () => {
    readiness.repository = false;
    metrics.readinessGauge.set({ component: 'repository' }, 0);
  });

  registerHealthRoutes(app, ctx);
  registerRootRoutes(app, ctx);
  registerWorkflowDefinitionRoutes(app, ctx);
  registerWorkflowInstanceRoutes(app, ctx);

  return { app, ctx };
};
