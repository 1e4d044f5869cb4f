// Server settings from a repo-root `.env`. Only the keys the classifier reads
// are taken; values already in the environment win.

import fs from "node:fs";

export const ENV_KEYS = ["PORT", "HOST", "LOG_LEVEL", "TAXCLASS_REPO_ROOT"] as const;

export type ClassifierEnvKey = (typeof ENV_KEYS)[number];

function isEnvKey(k: string): k is ClassifierEnvKey {
  return ENV_KEYS.some((known) => known === k);
}

export function parseEnvText(text: string): Partial<Record<ClassifierEnvKey, string>> {
  const out: Partial<Record<ClassifierEnvKey, string>> = {};
  for (const line of text.split(/\r?\n/)) {
    const eq = line.indexOf("=");
    if (line.trimStart().startsWith("#") || eq === -1) continue;
    const key = line.slice(0, eq).trim();
    if (!isEnvKey(key)) continue;
    out[key] = line.slice(eq + 1).trim().replace(/^(["'])(.*)\1$/, "$2");
  }
  return out;
}

export function applyEnvFile(filePath: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(filePath)) return;
  const values = parseEnvText(fs.readFileSync(filePath, "utf8"));
  for (const key of ENV_KEYS) {
    const v = values[key];
    if (v !== undefined && env[key] === undefined) env[key] = v;
  }
}
