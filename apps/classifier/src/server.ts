import path from "node:path";
import { fileURLToPath } from "node:url";

import { buildClassifierServer } from "./app";
import { applyEnvFile } from "./env";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "..");
applyEnvFile(path.join(repoRoot, ".env"));

const app = buildClassifierServer();

async function main(): Promise<void> {
  const port = Number(process.env.PORT ?? 3110);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
