/**
 * Catalog pass-through routes. The catalog path is the wildcard tail.
 *
 *   POST /renter/rename/*    { newsiapath }
 *   POST /renter/delete/*
 *   GET  /renter/download/*  ?destination=/abs/path
 *   POST /renter/upload/*    { source: "/abs/path" }
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import type { ControlSurface } from "../control-surface.js";

const RenameBody = Type.Object({ newsiapath: Type.String({ minLength: 1 }) });
type RenameBody = Static<typeof RenameBody>;

const DownloadQuery = Type.Object({ destination: Type.String() });
type DownloadQuery = Static<typeof DownloadQuery>;

const UploadBody = Type.Object({ source: Type.String() });
type UploadBody = Static<typeof UploadBody>;

interface CatalogParams {
  "*": string;
}

export function catalogRoutes(app: FastifyInstance, surface: ControlSurface): void {
  app.post<{ Params: CatalogParams; Body: RenameBody }>(
    "/renter/rename/*",
    { schema: { body: RenameBody } },
    async (request, reply) => {
      await surface.renameFile(request.params["*"], request.body.newsiapath);
      return reply.send({ ok: true });
    },
  );

  app.post<{ Params: CatalogParams }>("/renter/delete/*", async (request, reply) => {
    await surface.deleteFile(request.params["*"]);
    return reply.send({ ok: true });
  });

  app.get<{ Params: CatalogParams; Querystring: DownloadQuery }>(
    "/renter/download/*",
    { schema: { querystring: DownloadQuery } },
    async (request, reply) => {
      await surface.downloadFile(request.params["*"], request.query.destination);
      return reply.send({ ok: true });
    },
  );

  app.post<{ Params: CatalogParams; Body: UploadBody }>(
    "/renter/upload/*",
    { schema: { body: UploadBody } },
    async (request, reply) => {
      await surface.uploadFile(request.body.source, request.params["*"]);
      return reply.send({ ok: true });
    },
  );
}
