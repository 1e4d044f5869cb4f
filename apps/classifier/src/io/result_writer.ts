// Output boundary: gene table + sample detection table, optionally joined with
// free-form annotation columns read from additional TAB-delimited files.

import type { GeneClassRecordV1, SampleDetectionV1 } from "@taxclass/contracts";

import { readTabDelimited, TabularFormatError, writeTabDelimited } from "./tabular";

export const GENE_TABLE_HEADERS = ["gene_callers_id", "gene_class", "number_of_detections", "portion_detected"] as const;
export const SAMPLE_TABLE_HEADERS = ["samples", "detection"] as const;

export type AdditionalLayers = {
  columns: string[];
  // key -> column -> value
  rows: Map<string, Record<string, string>>;
};

/**
 * Reads an annotation table keyed by its first column. Gene keys are
 * normalised to their integer form so "007" joins gene 7.
 */
export function readAdditionalLayers(filePath: string, keyKind: "gene" | "sample"): AdditionalLayers {
  const t = readTabDelimited(filePath);
  const columns = t.header.slice(1);
  const reserved: ReadonlyArray<string> = keyKind === "gene" ? GENE_TABLE_HEADERS : SAMPLE_TABLE_HEADERS;
  const seen = new Set<string>();
  for (const c of columns) {
    if (reserved.includes(c)) throw new TabularFormatError(filePath, `column "${c}" collides with an output column`);
    if (seen.has(c)) throw new TabularFormatError(filePath, `duplicate column "${c}"`);
    seen.add(c);
  }
  const rows = new Map<string, Record<string, string>>();

  t.rows.forEach((cols, i) => {
    let key = cols[0];
    if (keyKind === "gene") {
      if (!/^\d+$/.test(key)) throw new TabularFormatError(filePath, `line ${i + 2}: gene key must be an integer, got "${key}"`);
      key = String(Number.parseInt(key, 10));
    }
    const rec: Record<string, string> = {};
    columns.forEach((c, j) => {
      rec[c] = cols[j + 1];
    });
    rows.set(key, rec);
  });

  return { columns, rows };
}

function layerCells(layers: AdditionalLayers | undefined, key: string): string[] {
  if (!layers) return [];
  const rec = layers.rows.get(key);
  return layers.columns.map((c) => rec?.[c] ?? "");
}

export function geneTable(genes: ReadonlyArray<GeneClassRecordV1>, layers?: AdditionalLayers): { header: string[]; rows: string[][] } {
  const header = [...GENE_TABLE_HEADERS, ...(layers?.columns ?? [])];
  const rows = genes.map((g) => {
    const key = String(g.gene_callers_id);
    return [
      key,
      // Downstream tooling reads unclassified genes as NaN.
      g.gene_class === "UNDETERMINED" ? "NaN" : g.gene_class,
      String(g.number_of_detections),
      String(g.portion_detected),
      ...layerCells(layers, key),
    ];
  });
  return { header, rows };
}

export function sampleTable(samples: ReadonlyArray<SampleDetectionV1>, layers?: AdditionalLayers): { header: string[]; rows: string[][] } {
  const header = [...SAMPLE_TABLE_HEADERS, ...(layers?.columns ?? [])];
  const rows = samples.map((s) => [s.samples, s.detection ? "True" : "False", ...layerCells(layers, s.samples)]);
  return { header, rows };
}

export function writeGeneTable(filePath: string, genes: ReadonlyArray<GeneClassRecordV1>, layers?: AdditionalLayers): void {
  const t = geneTable(genes, layers);
  writeTabDelimited(filePath, t.header, t.rows);
}

export function writeSampleTable(filePath: string, samples: ReadonlyArray<SampleDetectionV1>, layers?: AdditionalLayers): void {
  const t = sampleTable(samples, layers);
  writeTabDelimited(filePath, t.header, t.rows);
}
