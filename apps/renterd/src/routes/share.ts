/**
 * Share bundle routes.
 *
 *   GET  /renter/share       ?siapaths=a,b&destination=/abs/file
 *   GET  /renter/shareascii  ?siapaths=a,b          → { asciisia }
 *   POST /renter/load        { source: "/abs/file" } → { filesadded }
 *   POST /renter/loadascii   { asciisia }            → { filesadded }
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import type { ControlSurface } from "../control-surface.js";

const ShareQuery = Type.Object({
  siapaths: Type.String(),
  destination: Type.String(),
});
type ShareQuery = Static<typeof ShareQuery>;

const ShareAsciiQuery = Type.Object({ siapaths: Type.String() });
type ShareAsciiQuery = Static<typeof ShareAsciiQuery>;

const LoadBody = Type.Object({ source: Type.String() });
type LoadBody = Static<typeof LoadBody>;

const LoadAsciiBody = Type.Object({ asciisia: Type.String() });
type LoadAsciiBody = Static<typeof LoadAsciiBody>;

/**
 * siapaths travel comma-separated with no escape, so a catalog path that
 * itself contains a comma cannot be exported over HTTP.
 */
function splitPaths(raw: string): string[] {
  return raw.split(",");
}

export function shareRoutes(app: FastifyInstance, surface: ControlSurface): void {
  app.get<{ Querystring: ShareQuery }>(
    "/renter/share",
    { schema: { querystring: ShareQuery } },
    async (request, reply) => {
      const { siapaths, destination } = request.query;
      await surface.exportBundle(splitPaths(siapaths), destination);
      return reply.send({ ok: true });
    },
  );

  app.get<{ Querystring: ShareAsciiQuery }>(
    "/renter/shareascii",
    { schema: { querystring: ShareAsciiQuery } },
    async (request, reply) => {
      const asciisia = await surface.exportBundleText(splitPaths(request.query.siapaths));
      return reply.send({ asciisia });
    },
  );

  app.post<{ Body: LoadBody }>(
    "/renter/load",
    { schema: { body: LoadBody } },
    async (request, reply) => {
      const filesadded = await surface.loadBundle(request.body.source);
      return reply.send({ filesadded });
    },
  );

  app.post<{ Body: LoadAsciiBody }>(
    "/renter/loadascii",
    { schema: { body: LoadAsciiBody } },
    async (request, reply) => {
      const filesadded = await surface.loadBundleText(request.body.asciisia);
      return reply.send({ filesadded });
    },
  );
}
