import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { dispatch } from './dispatch';
import { parseFormBody } from '../http/formBody';
import type { RecordStore, StoreError } from '../contracts/recordStore';

// ---------- Schemas ----------
const fieldsSchema = z.object({
  name: z.string().min(1, 'name required'),
  size: z.string().min(1, 'size required'),
});

const ROUTED_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export const messages = {
  notFound: '404 Not Found',
  methodNotAllowed: '405 Method Not Allowed',
  badRequest: '400 Bad Request',
  invalidFields: "Missing or empty 'name' or 'size'",
  createFailed: 'Could not create squirrel with provided data',
  updateFailed: 'Could not update squirrel with provided data',
  deleteFailed: 'Could not delete squirrel',
};

// ---------- Helpers ----------
function sendText(reply: FastifyReply, statusCode: number, message: string) {
  return reply.code(statusCode).type('text/plain').send(message);
}

// Serialised here so replies built outside a route context answer the same way
function sendJson(reply: FastifyReply, value: unknown) {
  return reply.code(200).type('application/json').send(JSON.stringify(value));
}

function notFound(reply: FastifyReply) {
  return sendText(reply, 404, messages.notFound);
}

function readFields(req: FastifyRequest) {
  const body = Buffer.isBuffer(req.body) ? req.body : undefined;
  return fieldsSchema.safeParse(parseFormBody(body, req.headers['content-length']));
}

function logStoreError(req: FastifyRequest, error: StoreError, msg: string) {
  req.log.error({ code: error.code, detail: error.detail }, msg);
}

// Body read failures leave the body unset; the action then sees an empty field map
const BODY_READ_ERRORS = new Set(['FST_ERR_CTP_BODY_TOO_LARGE', 'FST_ERR_CTP_INVALID_CONTENT_LENGTH']);

// ---------- Actions ----------
/**
 * Dispatches the request and answers it. Shared by the catch-all route and by the
 * paths where Fastify fails before the route runs (bad URL escapes, unreadable bodies).
 */
export async function runSquirrelAction(store: RecordStore, req: FastifyRequest, reply: FastifyReply) {
  const route = dispatch(req.method, req.url);

  switch (route.action) {
    case 'index': {
      return sendJson(reply, await store.list());
    }

    case 'retrieve': {
      const record = await store.get(route.id);
      if (!record) return notFound(reply);
      return sendJson(reply, record);
    }

    case 'create': {
      const parsed = readFields(req);
      if (!parsed.success) return sendText(reply, 400, messages.invalidFields);

      const result = await store.insert(parsed.data);
      if (!result.ok) {
        logStoreError(req, result.error, 'Failed to create squirrel');
        return sendText(reply, 400, messages.createFailed);
      }
      req.log.info({ id: result.value.id }, 'Created squirrel');
      return reply.code(201).send();
    }

    case 'update': {
      // unknown id wins over a bad body
      const existing = await store.get(route.id);
      if (!existing) return notFound(reply);

      const parsed = readFields(req);
      if (!parsed.success) return sendText(reply, 400, messages.invalidFields);

      const result = await store.update(route.id, parsed.data);
      if (!result.ok) {
        if (result.error.code === 'not_found') return notFound(reply);
        logStoreError(req, result.error, 'Failed to update squirrel');
        return sendText(reply, 400, messages.updateFailed);
      }
      return reply.code(204).send();
    }

    case 'delete': {
      const existing = await store.get(route.id);
      if (!existing) return notFound(reply);

      const result = await store.delete(route.id);
      if (!result.ok) {
        if (result.error.code === 'not_found') return notFound(reply);
        logStoreError(req, result.error, 'Failed to delete squirrel');
        return sendText(reply, 400, messages.deleteFailed);
      }
      req.log.info({ id: result.value }, 'Deleted squirrel');
      return reply.code(204).send();
    }

    case 'methodNotAllowed':
      return sendText(reply, 405, messages.methodNotAllowed);

    case 'notFound':
      return notFound(reply);
  }
}

async function runOrBadRequest(store: RecordStore, req: FastifyRequest, reply: FastifyReply) {
  try {
    return await runSquirrelAction(store, req, reply);
  } catch (err) {
    req.log.error({ err }, 'Request failed');
    return sendText(reply, 400, messages.badRequest);
  }
}

/**
 * Fastify's router rejects paths with broken percent escapes before any route runs.
 * Those still get the routing table's answer; ids stay opaque.
 */
export function handleFrameworkError(store: RecordStore, err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  if (err.code !== 'FST_ERR_BAD_URL') {
    req.log.warn({ err }, 'Rejected request');
    sendText(reply, 400, messages.badRequest);
    return;
  }
  runOrBadRequest(store, req, reply).catch((sendErr) => {
    req.log.error({ err: sendErr }, 'Failed to answer request with a bad URL');
  });
}

// ---------- Routes ----------
export async function registerSquirrelRoutes(app: FastifyInstance, store: RecordStore) {
  // Content-Type is advisory: every body reaches the handler as raw bytes
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_req, body, done) => {
    done(null, body);
  });

  app.setNotFoundHandler((_req, reply) => notFound(reply));

  app.setErrorHandler(async (err, req, reply) => {
    if (BODY_READ_ERRORS.has(err.code)) {
      req.log.warn({ err }, 'Unreadable request body, treating it as empty');
      return runOrBadRequest(store, req, reply);
    }

    const statusCode = err.statusCode;
    if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
      req.log.warn({ err }, 'Rejected request');
      return sendText(reply, statusCode, err.message || messages.badRequest);
    }
    req.log.error({ err }, 'Request failed');
    return sendText(reply, 400, messages.badRequest);
  });

  app.route({
    method: [...ROUTED_METHODS],
    url: '/*',
    handler: async (req, reply) => runSquirrelAction(store, req, reply),
  });
}
