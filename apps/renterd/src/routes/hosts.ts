/**
 * Host discovery routes.
 *
 *   GET /renter/hosts/active ?numhosts=N — prefix of active hosts; N larger
 *                                          than the directory returns all
 *   GET /renter/hosts/all                — every known host
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import type { ControlSurface } from "../control-surface.js";

const ActiveHostsQuery = Type.Object({ numhosts: Type.Optional(Type.String()) });
type ActiveHostsQuery = Static<typeof ActiveHostsQuery>;

export function hostRoutes(app: FastifyInstance, surface: ControlSurface): void {
  app.get<{ Querystring: ActiveHostsQuery }>(
    "/renter/hosts/active",
    { schema: { querystring: ActiveHostsQuery } },
    async (request, reply) => {
      return reply.send({ hosts: await surface.listActiveHosts(request.query.numhosts) });
    },
  );

  app.get("/renter/hosts/all", async (_request, reply) => {
    return reply.send({ hosts: await surface.listAllHosts() });
  });
}
