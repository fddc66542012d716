import type { FastifyInstance } from 'fastify';
import type { ProcQuantity } from '../../procs/proc.js';

export interface InfoRouteDependencies {
  verifyToken: (token: string) => boolean;
  collectQuantities: () => Promise<ProcQuantity[]>;
}

interface InfoRouteParams {
  token: string;
}

/**
 * Endpoints polled by the autoscaler. Each info request evaluates every proc
 * against a fresh cycle cache.
 */
export const registerInfoRoutes = (
  app: FastifyInstance,
  dependencies: InfoRouteDependencies
): void => {
  app.get('/autoscale/test', () => ({ status: 'ok' }));

  app.get<{ Params: InfoRouteParams }>('/autoscale/:token/info', async (request, reply) => {
    if (!dependencies.verifyToken(request.params.token)) {
      return reply.status(404).send({ error: 'not_found' });
    }

    const quantities = await dependencies.collectQuantities();
    return reply.send(serialiseQuantities(quantities));
  });
};

const serialiseQuantities = (quantities: ProcQuantity[]) =>
  quantities.map((entry) => ({
    name: entry.name,
    quantity: entry.quantity
  }));
