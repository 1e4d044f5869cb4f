import Fastify from "fastify";
import type { FastifyInstance } from "fastify";

import { ClassifierPipelineV1 } from "./pipeline";
import { registerClassifierRoutes } from "./routes";

export type ClassifierServerOptions = {
  logger?: boolean;
  pipeline?: ClassifierPipelineV1;
};

export function buildClassifierServer(opts: ClassifierServerOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: opts.logger === false ? false : { level: process.env.LOG_LEVEL ?? "info" },
    bodyLimit: 50 * 1024 * 1024,
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  registerClassifierRoutes(app, opts.pipeline ?? new ClassifierPipelineV1(app.log));
  return app;
}
