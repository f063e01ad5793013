/**
 * Parser for kubectl's column-aligned table output.
 *
 * kubectl pads every column to a common width, so a column starts where a
 * header word follows two or more spaces. Header names may contain single
 * spaces ("NOMINATED NODE"). Cells are cut at the header's column offsets;
 * the last column runs to the end of the line.
 */

import type { TableData } from "@kubenav/core";

function columnStarts(header: string): number[] {
  const starts: number[] = [];
  let spaces = 0;
  let seenText = false;
  for (let i = 0; i < header.length; i++) {
    const ch = header[i];
    if (ch === " " || ch === "\t") {
      spaces++;
      continue;
    }
    if (!seenText || spaces >= 2) starts.push(i);
    seenText = true;
    spaces = 0;
  }
  return starts;
}

function cut(line: string, starts: readonly number[]): string[] {
  return starts.map((start, index) => line.slice(start, starts[index + 1]).trim());
}

export function parseKubectlTable(text: string): TableData {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const headerLine = lines[0];
  if (headerLine === undefined) {
    return { header: [], rows: [] };
  }
  const starts = columnStarts(headerLine);
  return {
    header: cut(headerLine, starts),
    rows: lines.slice(1).map((line) => cut(line, starts)),
  };
}
