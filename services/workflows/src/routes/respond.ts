import type { CollectionDocument, TransitionContext } from '@cjkit/hypermedia';
import type { FastifyReply, FastifyRequest } from 'fastify';

import type { AppContext } from '../types';

export const respond = async (
  ctx: AppContext,
  request: FastifyRequest,
  reply: FastifyReply,
  document: CollectionDocument,
  statusCode = 200
): Promise<FastifyReply> => {
  const response = await request.server.hypermedia.representor.represent(document, request.headers.accept);
  ctx.metrics.documentsRepresented.inc({ representation: response.representation });
  return reply.status(statusCode).type(response.contentType).send(response.body);
};

/** POST handlers answer with 303 to the resource the transition points at. */
export const redirectTo = (
  request: FastifyRequest,
  reply: FastifyReply,
  operationId: string,
  context: TransitionContext = {}
): FastifyReply => {
  const target = request.server.hypermedia.forRequest(request).transition(operationId, context);
  return reply.redirect(303, target?.href ?? '/');
};
