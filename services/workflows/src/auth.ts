import fp from 'fastify-plugin';

export interface RequestIdentity {
  userId: string;
  username: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    identity: RequestIdentity | null;
  }
}

type IdentityPluginOptions = {
  identity: RequestIdentity;
};

/**
 * Attaches a fixed demo identity to every request. Replace with a real
 * authentication plugin before exposing the service.
 */
export const identityPlugin = fp<IdentityPluginOptions>(
  async (app, options) => {
    const { identity } = options;
    app.decorateRequest<RequestIdentity | null>('identity', null);

    app.addHook('onRequest', async (request) => {
      request.identity = { ...identity };
    });
  },
  { name: 'workflows-identity' }
);

export const requireIdentity = (identity: RequestIdentity | null): RequestIdentity => {
  if (!identity) {
    throw new Error('Request has no identity');
  }
  return identity;
};
