import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { RecordNotFoundError, type ExampleStore } from '../contracts/exampleStore';
import { pageLinks, pageWindow, parsePage } from '../pagination';
import {
  serializeExample,
  validateCreate,
  validateUpdate,
  type ExampleListResponse,
  type FieldError,
} from '../schemas/example';
import type { ExampleId, ExampleRecord } from '../types';

export type ExampleRoutesOptions = {
  store: ExampleStore;
  pageSize: number;
  publicBaseUrl?: string;
};

type IdParams = { id: ExampleId };
type ListQuery = { page?: string | string[] };

// ---------- Helpers ----------
function notFound(reply: FastifyReply) {
  return reply.code(404).send({ error: 'not_found' });
}

function badRequest(reply: FastifyReply, errors: FieldError[]) {
  return reply.code(400).send({ validation_errors: errors });
}

async function findExample(store: ExampleStore, id: ExampleId): Promise<ExampleRecord | null> {
  try {
    return await store.get(id);
  } catch (err) {
    if (err instanceof RecordNotFoundError) return null;
    throw err;
  }
}

function requestUrl(req: FastifyRequest, publicBaseUrl?: string): URL {
  const base = publicBaseUrl ?? `${req.protocol}://${req.hostname}`;
  return new URL(`${base}${req.url}`);
}

// ---------- Routes ----------
export async function registerExampleRoutes(app: FastifyInstance, options: ExampleRoutesOptions) {
  const { store, pageSize, publicBaseUrl } = options;

  // List (page-number pagination, newest first)
  app.get<{ Querystring: ListQuery }>('/examples', async (req, reply) => {
    const window = pageWindow(parsePage(req.query.page), pageSize);
    const { items, total } = await store.list(window.offset, window.limit);
    const links = pageLinks(requestUrl(req, publicBaseUrl), window, total);

    const body: ExampleListResponse = {
      count: total,
      next: links.next,
      previous: links.previous,
      results: items.map(serializeExample),
    };
    return reply.send(body);
  });

  // Create
  app.post('/examples', async (req, reply) => {
    const validated = validateCreate(req.body);
    if (!validated.ok) return badRequest(reply, validated.errors);

    const record = await store.create(validated.value);
    req.log.info({ exampleId: record.id }, 'Example created');
    return reply.code(201).send(serializeExample(record));
  });

  // Retrieve
  app.get<{ Params: IdParams }>('/examples/:id', async (req, reply) => {
    const record = await findExample(store, req.params.id);
    if (!record) return notFound(reply);
    return reply.send(serializeExample(record));
  });

  // Update: existence is checked before the payload is validated
  const update = async (req: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
    const { id } = req.params;
    const existing = await findExample(store, id);
    if (!existing) return notFound(reply);

    const validated = validateUpdate(req.body);
    if (!validated.ok) return badRequest(reply, validated.errors);

    try {
      const record = await store.update(id, validated.value);
      return reply.send(serializeExample(record));
    } catch (err) {
      // deleted between the read and the write
      if (err instanceof RecordNotFoundError) return notFound(reply);
      throw err;
    }
  };
  app.put<{ Params: IdParams }>('/examples/:id', update);
  app.patch<{ Params: IdParams }>('/examples/:id', update);

  // Delete
  app.delete<{ Params: IdParams }>('/examples/:id', async (req, reply) => {
    try {
      await store.delete(req.params.id);
    } catch (err) {
      if (err instanceof RecordNotFoundError) return notFound(reply);
      throw err;
    }
    req.log.info({ exampleId: req.params.id }, 'Example deleted');
    return reply.code(204).send();
  });
}
