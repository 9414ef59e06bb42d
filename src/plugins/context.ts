import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

import type { CanvasClient } from "../lib/canvasClient.js";
import type { AppDatabase } from "../lib/db.js";
import type { AppConfig } from "../lib/env.js";
import type { ReconcileContext } from "../lib/reconcile.js";

declare module "fastify" {
  interface FastifyInstance {
    config: AppConfig;
    db: AppDatabase;
    canvas: CanvasClient;
  }

  interface FastifyRequest {
    reconcileContext: () => ReconcileContext;
  }
}

export interface ContextPluginOptions {
  config: AppConfig;
  db: AppDatabase;
  canvas: CanvasClient;
}

const contextPlugin: FastifyPluginAsync<ContextPluginOptions> = async (fastify, options) => {
  fastify.decorate("config", options.config);
  fastify.decorate("db", options.db);
  fastify.decorate("canvas", options.canvas);

  fastify.decorateRequest("reconcileContext", function reconcileContext() {
    return { db: options.db, canvas: options.canvas, log: this.log };
  });
};

export default fp(contextPlugin);
