import type { FastifyInstance } from "fastify";
import type { ProfileConstants } from "@renterctl/core";

export function healthRoutes(app: FastifyInstance, profile: ProfileConstants): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({ status: "ok", profile: profile.name, timestamp: Date.now() });
  });
}
