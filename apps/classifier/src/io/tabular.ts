// TAB-delimited files: first line is the header, one record per line after it.
// Blank lines are skipped; a trailing "\r" is tolerated.

import fs from "node:fs";

export type TabularTable = {
  header: string[];
  rows: string[][];
};

export class TabularFormatError extends Error {
  public readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = "TabularFormatError";
    this.filePath = filePath;
  }
}

export function parseTabDelimited(text: string, filePath = "<memory>"): TabularTable {
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== "");
  if (lines.length === 0) throw new TabularFormatError(filePath, "file is empty");

  const header = lines[0].split("\t").map((s) => s.trim());
  const rows: string[][] = [];
  for (let i = 1; i < lines.length; i++) {
    const cols = lines[i].split("\t").map((s) => s.trim());
    if (cols.length !== header.length) {
      throw new TabularFormatError(filePath, `line ${i + 1} has ${cols.length} columns, header has ${header.length}`);
    }
    rows.push(cols);
  }
  return { header, rows };
}

export function readTabDelimited(filePath: string): TabularTable {
  return parseTabDelimited(fs.readFileSync(filePath, "utf8"), filePath);
}

export function formatTabDelimited(header: ReadonlyArray<string>, rows: ReadonlyArray<ReadonlyArray<string>>): string {
  const lines = [header.join("\t"), ...rows.map((r) => r.join("\t"))];
  return lines.join("\n") + "\n";
}

export function writeTabDelimited(
  filePath: string,
  header: ReadonlyArray<string>,
  rows: ReadonlyArray<ReadonlyArray<string>>
): void {
  fs.writeFileSync(filePath, formatTabDelimited(header, rows), "utf8");
}
