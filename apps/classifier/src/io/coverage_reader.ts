import { CoverageTableV1Z } from "@taxclass/contracts";
import type { CoverageTableV1 } from "@taxclass/contracts";

import { parseTabDelimited, readTabDelimited, TabularFormatError } from "./tabular";
import type { TabularTable } from "./tabular";

function parseGeneId(raw: string, filePath: string, line: number): number {
  if (!/^\d+$/.test(raw)) throw new TabularFormatError(filePath, `line ${line}: gene_callers_id must be a non-negative integer, got "${raw}"`);
  return Number.parseInt(raw, 10);
}

function parseCoverage(raw: string, filePath: string, line: number, sample: string): number {
  const n = raw === "" ? NaN : Number(raw);
  if (!Number.isFinite(n)) {
    throw new TabularFormatError(filePath, `line ${line}: coverage for sample ${sample} is not a number: "${raw}"`);
  }
  return n;
}

/**
 * Coverage table: first column gene_callers_id, one numeric column per sample.
 */
export function coverageTableFromTabular(table: TabularTable, filePath: string): CoverageTableV1 {
  const samples = table.header.slice(1);
  const rows = table.rows.map((cols, i) => {
    const line = i + 2;
    const coverage: Record<string, number> = {};
    samples.forEach((s, j) => {
      coverage[s] = parseCoverage(cols[j + 1], filePath, line, s);
    });
    return { gene_callers_id: parseGeneId(cols[0], filePath, line), coverage };
  });

  const parsed = CoverageTableV1Z.safeParse({ samples, rows });
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new TabularFormatError(filePath, `${first.path.join(".")}: ${first.message}`);
  }
  return parsed.data;
}

export function parseCoverageText(text: string, filePath = "<memory>"): CoverageTableV1 {
  return coverageTableFromTabular(parseTabDelimited(text, filePath), filePath);
}

export function readCoverageTable(filePath: string): CoverageTableV1 {
  return coverageTableFromTabular(readTabDelimited(filePath), filePath);
}
