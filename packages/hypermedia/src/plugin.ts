import '@fastify/swagger';
import type { FastifyRequest, RouteOptions } from 'fastify';
import fp from 'fastify-plugin';

import { TransitionCatalog } from './catalogCache';
import type { DescriptorSource } from './catalogCache';
import { Hypermedia } from './documentAssembler';
import type { HtmlRenderer } from './htmlRenderer';
import { Representor } from './representor';
import { isRecord, readString } from './schemaResolution';
import { TransitionResolver } from './transitions';

export interface HypermediaPluginOptions {
  renderer: HtmlRenderer;
  mediaType?: string;
  nameOperationsFromHandlers?: boolean;
  descriptor?: DescriptorSource;
}

export interface HypermediaRegistry {
  readonly catalog: TransitionCatalog;
  readonly representor: Representor;
  resolver(): TransitionResolver;
  forRequest(request: FastifyRequest): Hypermedia;
}

declare module 'fastify' {
  interface FastifyInstance {
    hypermedia: HypermediaRegistry;
  }
}

export const requestUrl = (request: FastifyRequest): string =>
  `${request.protocol}://${request.hostname}${request.url}`;

const readOperationId = (schema: unknown): string | undefined =>
  isRecord(schema) ? readString(schema.operationId) : undefined;

/**
 * Records handler identities for every named route. Unnamed routes take the
 * handler's function name as operation id when naming is enabled.
 */
const registerRouteHandle = (
  catalog: TransitionCatalog,
  route: RouteOptions,
  nameOperationsFromHandlers: boolean
): void => {
  let operationId = readOperationId(route.schema);
  if (!operationId && nameOperationsFromHandlers && route.handler.name) {
    operationId = route.handler.name;
    route.schema = Object.assign({}, route.schema, { operationId });
  }
  if (operationId) {
    catalog.registerHandle(route.handler, operationId);
  }
};

export const hypermediaPlugin = fp<HypermediaPluginOptions>(
  async (app, options) => {
    const descriptor: DescriptorSource = options.descriptor ?? (() => app.swagger());
    const catalog = new TransitionCatalog(descriptor, { logger: app.log });
    const representor = new Representor(options.renderer, options.mediaType);
    const resolver = new TransitionResolver(catalog);
    const nameOperationsFromHandlers = options.nameOperationsFromHandlers ?? true;

    app.addHook('onRoute', (route) => {
      registerRouteHandle(catalog, route, nameOperationsFromHandlers);
      catalog.invalidate();
    });

    const registry: HypermediaRegistry = {
      catalog,
      representor,
      resolver: () => resolver,
      forRequest: (request) => new Hypermedia(resolver, requestUrl(request))
    };

    app.decorate('hypermedia', registry);
  },
  {
    name: 'cjkit-hypermedia',
    fastify: '4.x',
    dependencies: ['@fastify/swagger']
  }
);
