/**
 * Zod request parsing
 *
 * Routes call req.parseBody(schema) / req.parseQuery(schema) / req.parseParams(schema).
 * A failed parse becomes a ValidationFailedError, so the global handler can
 * tell malformed input apart from everything else.
 */

import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { ZodTypeAny, z } from 'zod';
import { parseWith } from '../common/validation.js';

declare module 'fastify' {
  interface FastifyRequest {
    parseBody<T extends ZodTypeAny>(schema: T): z.output<T>;
    parseQuery<T extends ZodTypeAny>(schema: T): z.output<T>;
    parseParams<T extends ZodTypeAny>(schema: T): z.output<T>;
  }
}

async function zodRequestParsing(app: FastifyInstance): Promise<void> {
  app.decorateRequest('parseBody', function parseBody<T extends ZodTypeAny>(this: FastifyRequest, schema: T) {
    // an empty body arrives as undefined; let the schema report the missing fields
    return parseWith(schema, this.body ?? {});
  });

  app.decorateRequest('parseQuery', function parseQuery<T extends ZodTypeAny>(this: FastifyRequest, schema: T) {
    return parseWith(schema, this.query ?? {});
  });

  app.decorateRequest('parseParams', function parseParams<T extends ZodTypeAny>(this: FastifyRequest, schema: T) {
    return parseWith(schema, this.params ?? {});
  });
}

export const zodPlugin = fp(zodRequestParsing, { name: 'zod-request-parsing' });
