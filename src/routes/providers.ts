// Provider routes
import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '../app.js';
import { AppError } from '../utils/errors.js';

export async function providerRoutes(server: FastifyInstance, opts: RouteOptions) {
  const { providers } = opts.deps;

  // GET /v1/providers - Configured providers and whether they answer
  server.get('/providers', async () => {
    const list = await Promise.all(
      providers.list().map(async name => ({ name, available: await providers.isAvailable(name) }))
    );
    return { providers: list };
  });

  // GET /v1/providers/:name/models - Models a provider serves
  server.get<{ Params: { name: string } }>('/providers/:name/models', async (request) => {
    const provider = providers.get(request.params.name);
    if (!provider) {
      throw AppError.notFound(`Provider '${request.params.name}' not found`);
    }

    try {
      const models = await provider.listModels();
      return { provider: provider.name, models };
    } catch (err) {
      throw AppError.providerError(provider.name, err);
    }
  });
}
