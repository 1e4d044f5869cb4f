import type { FastifyInstance } from "fastify";

import { ClassifierRunRequestV1Z } from "@taxclass/contracts";
import { ClassifierConfigError, CoverageMatrixError } from "@taxclass/classifier-kernel";

import type { ClassifierPipelineV1 } from "./pipeline";
import { ClassifierConfigPatchRejected } from "./config/patch";

export function registerClassifierRoutes(app: FastifyInstance, pipeline: ClassifierPipelineV1): void {
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true });
  });

  // GET /api/classifier/config
  // Returns SSOT fingerprint + editable manifest (machine-readable).
  app.get("/api/classifier/config", async (_req, reply) => {
    return reply.send(pipeline.manifest());
  });

  app.post("/api/classifier/run", async (req, reply) => {
    const parsed = ClassifierRunRequestV1Z.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({
        ok: false,
        errors: parsed.error.issues.map((i) => ({ code: "INVALID_REQUEST", path: i.path.join("."), message: i.message })),
      });
    }

    try {
      const { output } = pipeline.run(parsed.data);
      return reply.send(output);
    } catch (e: unknown) {
      if (e instanceof ClassifierConfigPatchRejected) {
        return reply.code(e.status).send({ ok: false, errors: e.errors });
      }
      if (e instanceof ClassifierConfigError) {
        return reply.code(400).send({
          ok: false,
          errors: e.issues.map((message) => ({ code: "INVALID_CONFIG", path: "config", message })),
        });
      }
      if (e instanceof CoverageMatrixError) {
        return reply.code(400).send({ ok: false, errors: [{ code: "INVALID_COVERAGE", path: "coverage", message: e.message }] });
      }
      throw e;
    }
  });
}
