/**
 * renterd — HTTP control surface for the storage renter.
 *
 * Routes:
 *   GET/POST /renter                 — allowance settings + financial metrics
 *   GET  /renter/contracts           — contracts with derived size
 *   GET  /renter/downloads           — download queue
 *   GET  /renter/files               — file catalog
 *   POST /renter/load, /loadascii    — import a share bundle
 *   GET  /renter/share, /shareascii  — export a share bundle
 *   POST /renter/rename/*, /delete/* — catalog mutations
 *   GET  /renter/download/*          — fetch a file to a local path
 *   POST /renter/upload/*            — store a local file
 *   GET  /renter/hosts/active, /all  — host directory
 *   GET  /health                     — liveness
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyServerOptions } from "fastify";
import { profileByName, type ProfileConstants } from "@renterctl/core";
import { MemoryRenterEngine, syntheticHosts, type RenterEngine } from "@renterctl/engine";
import { config } from "./config.js";
import { ControlSurface } from "./control-surface.js";
import { renterErrorHandler } from "./errors.js";
import { renterRoutes } from "./routes/renter.js";
import { catalogRoutes } from "./routes/catalog.js";
import { shareRoutes } from "./routes/share.js";
import { hostRoutes } from "./routes/hosts.js";
import { healthRoutes } from "./routes/health.js";

export interface RenterdDeps {
  engine?: RenterEngine;
  profile?: ProfileConstants;
  logger?: FastifyServerOptions["logger"];
}

/** In-process engine seeded from config (dev mode). */
function createEngine(profile: ProfileConstants): RenterEngine {
  return new MemoryRenterEngine({
    profile,
    hosts: syntheticHosts(config.devHosts),
    blockHeight: config.blockHeight,
  });
}

export async function buildApp(deps?: RenterdDeps) {
  const profile = deps?.profile ?? profileByName(config.profile);
  const engine = deps?.engine ?? createEngine(profile);

  const app = Fastify({
    logger: deps?.logger ?? { level: config.logLevel },
  });

  app.setErrorHandler(renterErrorHandler);

  const surface = new ControlSurface(engine, profile);

  renterRoutes(app, surface);
  catalogRoutes(app, surface);
  shareRoutes(app, surface);
  hostRoutes(app, surface);
  healthRoutes(app, profile);

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── renterd config ───");
  console.log(`  port:         ${config.port}`);
  console.log(`  profile:      ${config.profile}`);
  console.log(`  dev_hosts:    ${config.devHosts}`);
  console.log(`  block_height: ${config.blockHeight}`);
  console.log("──────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
