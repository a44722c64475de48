/**
 * Error → reply mapping for every route.
 *
 *   InputValidationError      → 400 { error: code, detail }
 *   EngineError (client)      → 400 { error: code, detail }
 *   EngineError (server)      → 500 { error: code, detail }
 *   schema validation failure → 400 { error: "invalid_request", detail }
 */

import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { EngineError, InputValidationError } from "@renterctl/core";

export function renterErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  if (error instanceof InputValidationError) {
    return reply.status(400).send({ error: error.code, detail: error.message });
  }

  if (error instanceof EngineError) {
    if (error.severity === "server") {
      request.log.error({ err: error, code: error.code }, "engine transfer failed");
      return reply.status(500).send({ error: error.code, detail: error.message });
    }
    request.log.warn({ code: error.code }, error.message);
    return reply.status(400).send({ error: error.code, detail: error.message });
  }

  if (error.validation) {
    return reply.status(400).send({ error: "invalid_request", detail: error.message });
  }

  request.log.error(error);
  return reply.status(error.statusCode ?? 500).send({ error: "internal", detail: error.message });
}
