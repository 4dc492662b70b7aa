import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';
import { respond } from './respond';

export const registerRootRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get(
    '/',
    {
      schema: {
        summary: 'Home',
        tags: ['collection']
      }
    },
    async function home(request, reply) {
      const hypermedia = app.hypermedia.forRequest(request);
      const document = hypermedia.buildDocument({
        title: 'Home',
        links: ['home', 'listWorkflowDefinitions', 'listWorkflowInstances']
      });
      return respond(ctx, request, reply, document);
    }
  );
};
