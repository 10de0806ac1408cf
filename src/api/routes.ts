import { FastifyInstance, FastifyReply } from 'fastify';
import { IndexRegistry } from '../core/index-registry.js';
import { KeyType, RangeDirection, SeekOp } from '../types/ordered-index.js';
import { getErrorMessage, isIndexError } from '../utils/error-utils.js';
import { parseKey } from '../utils/keys.js';

interface IndexParams {
  name: string;
}

interface EntryParams {
  name: string;
  key: string;
}

interface CreateIndexBody {
  name: string;
  keyType: KeyType;
}

interface PutEntryBody {
  key: unknown;                   // Checked against the index key type by the registry
  value: unknown;
}

interface SeekQuery {
  key: string;
  op: SeekOp;
}

interface RangeQuerystring {
  from?: string;
  direction: RangeDirection;
  limit?: number;
  exclusive: boolean;
}

export interface RouteOptions {
  maxRangeLimit: number;
}

export function registerRoutes(fastify: FastifyInstance, registry: IndexRegistry, options: RouteOptions): void {
  // Schema definitions for OpenAPI
  const keySchema = { type: ['number', 'string'], description: 'Entry key (number or string per index key type)' };

  const entrySchema = {
    type: 'object',
    properties: {
      key: keySchema,
      value: { description: 'Arbitrary JSON value' }
    }
  };

  const statsSchema = {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Index name' },
      keyType: { type: 'string', enum: ['number', 'string'] },
      size: { type: 'integer', description: 'Number of entries' },
      min: { type: ['number', 'string', 'null'], description: 'Smallest key' },
      max: { type: ['number', 'string', 'null'], description: 'Largest key' },
      height: { type: 'integer', description: 'Height of the underlying tree' },
      lastUpdateTime: { type: 'number', description: 'Last modification timestamp' }
    }
  };

  const errorSchema = {
    type: 'object',
    properties: {
      error: { type: 'string', description: 'Error message' }
    }
  };

  const indexParamsSchema = {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', description: 'Index name' }
    }
  };

  const entryParamsSchema = {
    type: 'object',
    required: ['name', 'key'],
    properties: {
      name: { type: 'string', description: 'Index name' },
      key: { type: 'string', description: 'Entry key, parsed per index key type' }
    }
  };

  // Maps registry failures to their status; anything else is a 500
  const sendError = (reply: FastifyReply, error: unknown) => {
    if (isIndexError(error)) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    fastify.log.error(`Unexpected index failure: ${getErrorMessage(error)}`);
    return reply.code(500).send({ error: 'Internal error' });
  };

  fastify.get('/api/health', {
    schema: {
      tags: ['System'],
      summary: 'Health check',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'number' },
            indexes: { type: 'integer' }
          }
        }
      }
    }
  }, async () => {
    return {
      status: 'ok',
      timestamp: Date.now(),
      indexes: registry.listIndexes().length
    };
  });

  fastify.get('/api/indexes', {
    schema: {
      tags: ['Indexes'],
      summary: 'List indexes',
      response: {
        200: {
          type: 'object',
          properties: {
            indexes: { type: 'array', items: statsSchema }
          }
        }
      }
    }
  }, async () => {
    return { indexes: registry.listIndexes() };
  });

  fastify.post<{ Body: CreateIndexBody }>('/api/indexes', {
    schema: {
      tags: ['Indexes'],
      summary: 'Create an index',
      body: {
        type: 'object',
        required: ['name', 'keyType'],
        properties: {
          name: { type: 'string', description: 'Index name' },
          keyType: { type: 'string', enum: ['number', 'string'], description: 'Type of every key in the index' }
        }
      },
      response: {
        201: statsSchema,
        400: errorSchema,
        409: errorSchema
      }
    }
  }, async (request, reply) => {
    const { name, keyType } = request.body;
    try {
      const index = registry.createIndex(name, keyType);
      return reply.code(201).send(index.stats());
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.delete<{ Params: IndexParams }>('/api/indexes/:name', {
    schema: {
      tags: ['Indexes'],
      summary: 'Drop an index and all its entries',
      params: indexParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            dropped: { type: 'string' }
          }
        },
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      registry.dropIndex(request.params.name);
      return reply.send({ dropped: request.params.name });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: IndexParams }>('/api/indexes/:name/stats', {
    schema: {
      tags: ['Indexes'],
      summary: 'Index statistics',
      params: indexParamsSchema,
      response: {
        200: statsSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(registry.getIndex(request.params.name).stats());
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post<{ Params: IndexParams; Body: PutEntryBody }>('/api/indexes/:name/entries', {
    schema: {
      tags: ['Entries'],
      summary: 'Insert an entry',
      description: 'Inserts a new entry; an existing key is left untouched and answered with 409',
      params: indexParamsSchema,
      body: {
        type: 'object',
        required: ['key'],
        properties: {
          // Untyped so Ajv passes the key through uncoerced; the registry checks its type
          key: { description: keySchema.description },
          value: { description: 'Arbitrary JSON value' }
        }
      },
      response: {
        201: entrySchema,
        400: errorSchema,
        404: errorSchema,
        409: errorSchema
      }
    }
  }, async (request, reply) => {
    const { name } = request.params;
    const { key, value = null } = request.body;
    try {
      if (!registry.putEntry(name, key, value)) {
        return reply.code(409).send({ error: `Key ${String(key)} already exists in index ${name}` });
      }
      return reply.code(201).send({ key, value });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: EntryParams }>('/api/indexes/:name/entries/:key', {
    schema: {
      tags: ['Entries'],
      summary: 'Get an entry by key',
      params: entryParamsSchema,
      response: {
        200: entrySchema,
        400: errorSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const { name, key } = request.params;
    try {
      const index = registry.getIndex(name);
      const entry = index.get(parseKey(key, index.getKeyType()));
      if (!entry) {
        return reply.code(404).send({ error: `Key ${key} not found in index ${name}` });
      }
      return reply.send(entry);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.delete<{ Params: EntryParams }>('/api/indexes/:name/entries/:key', {
    schema: {
      tags: ['Entries'],
      summary: 'Delete an entry by key',
      params: entryParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            deleted: keySchema
          }
        },
        400: errorSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const { name, key } = request.params;
    try {
      const parsed = parseKey(key, registry.getIndex(name).getKeyType());
      if (!registry.removeEntry(name, parsed)) {
        return reply.code(404).send({ error: `Key ${key} not found in index ${name}` });
      }
      return reply.send({ deleted: parsed });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: IndexParams; Querystring: SeekQuery }>('/api/indexes/:name/seek', {
    schema: {
      tags: ['Entries'],
      summary: 'Nearest entry to a key',
      description: "op=ge returns the smallest entry >= key, op=le the largest entry <= key",
      params: indexParamsSchema,
      querystring: {
        type: 'object',
        required: ['key'],
        properties: {
          key: { type: 'string' },
          op: { type: 'string', enum: ['ge', 'le'], default: 'ge' }
        }
      },
      response: {
        200: entrySchema,
        400: errorSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const { name } = request.params;
    const { key, op } = request.query;
    try {
      const index = registry.getIndex(name);
      const entry = index.seek(parseKey(key, index.getKeyType()), op);
      if (!entry) {
        const relation = op === 'ge' ? '>=' : '<=';
        return reply.code(404).send({ error: `No entry ${relation} ${key} in index ${name}` });
      }
      return reply.send(entry);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: IndexParams; Querystring: RangeQuerystring }>('/api/indexes/:name/range', {
    schema: {
      tags: ['Entries'],
      summary: 'Ordered page of entries',
      description: 'Walks from `from` (or the first/last entry) in the given direction; pass nextKey as `from` with exclusive=false to continue',
      params: indexParamsSchema,
      querystring: {
        type: 'object',
        properties: {
          from: { type: 'string' },
          direction: { type: 'string', enum: ['asc', 'desc'], default: 'asc' },
          limit: { type: 'integer', minimum: 1 },
          exclusive: { type: 'boolean', default: false }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            entries: { type: 'array', items: entrySchema },
            nextKey: { type: ['number', 'string', 'null'] }
          }
        },
        400: errorSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const { name } = request.params;
    const { from, direction, limit, exclusive } = request.query;
    try {
      const index = registry.getIndex(name);
      const result = index.range({
        from: from === undefined ? undefined : parseKey(from, index.getKeyType()),
        direction,
        limit: Math.min(limit ?? options.maxRangeLimit, options.maxRangeLimit),
        exclusive
      });
      return reply.send(result);
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
