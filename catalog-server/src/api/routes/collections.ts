import type { FastifyInstance } from 'fastify';
import type { MetadataSource } from 'pg-metadata-catalog';

interface CollectionParams {
  name: string;
}

interface QueryBody {
  restrictions?: (string | null)[];
}

const queryBodySchema = {
  type: 'object',
  properties: {
    restrictions: {
      type: 'array',
      items: { type: ['string', 'null'] },
    },
  },
  additionalProperties: false,
} as const;

export async function registerCollectionRoutes(app: FastifyInstance, source: MetadataSource): Promise<void> {
  // GET /collections — names and restriction columns of every collection
  app.get('/collections', async () => {
    return { collections: source.listCollections() };
  });

  // GET /collections/:name — the whole collection, unrestricted
  app.get<{ Params: CollectionParams }>('/collections/:name', async (request) => {
    return source.fetch(request.params.name);
  });

  // POST /collections/:name/query — filtered by positional restrictions
  app.post<{ Params: CollectionParams; Body: QueryBody }>(
    '/collections/:name/query',
    { schema: { body: queryBodySchema } },
    async (request) => {
      return source.fetch(request.params.name, request.body.restrictions ?? []);
    },
  );
}
