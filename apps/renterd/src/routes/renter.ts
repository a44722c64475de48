/**
 * Renter settings + list routes.
 *
 *   GET  /renter            — allowance + financial metrics
 *   POST /renter            — replace the allowance
 *   GET  /renter/contracts  — active contracts
 *   GET  /renter/downloads  — download queue
 *   GET  /renter/files      — file catalog
 */

import type { FastifyInstance } from "fastify";
import { SetSettingsBody } from "@renterctl/core";
import type { ControlSurface } from "../control-surface.js";

export function renterRoutes(app: FastifyInstance, surface: ControlSurface): void {
  app.get("/renter", async (_request, reply) => {
    return reply.send(await surface.getSettings());
  });

  /**
   * POST /renter — every field is a raw string; hosts and renewwindow
   * may be omitted and are then defaulted from the profile / period.
   */
  app.post<{ Body: SetSettingsBody }>(
    "/renter",
    { schema: { body: SetSettingsBody } },
    async (request, reply) => {
      const { funds, hosts, period, renewwindow } = request.body;
      const applied = await surface.setSettings({ funds, hosts, period, renewWindow: renewwindow });
      request.log.info(
        { hosts: applied.hosts, period: applied.period, renewWindow: applied.renewWindow },
        "allowance updated",
      );
      return reply.send({ ok: true });
    },
  );

  app.get("/renter/contracts", async (_request, reply) => {
    return reply.send({ contracts: await surface.listContracts() });
  });

  app.get("/renter/downloads", async (_request, reply) => {
    return reply.send({ downloads: await surface.listDownloads() });
  });

  app.get("/renter/files", async (_request, reply) => {
    return reply.send({ files: await surface.listFiles() });
  });
}
