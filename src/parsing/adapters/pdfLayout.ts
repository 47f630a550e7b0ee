/**
 * PDF page layout
 *
 * pdf2json hands out positioned text runs, not tables. Runs are grouped into
 * lines by their y coordinate, and each line is split into cells using the
 * x positions of the widest line on the page (usually the table header or a
 * fully filled product row) as column anchors.
 */

import type { Row, Table } from '../types';

export interface TextRun {
  x: number;
  y: number;
  text: string;
}

export interface TextLine {
  y: number;
  /** Sorted by x */
  runs: TextRun[];
}

/** Runs closer than this on the y axis share a line */
export const LINE_TOLERANCE = 0.5;

/** A run may start this far left of its column anchor */
export const ANCHOR_TOLERANCE = 0.3;

/**
 * Decodes a pdf2json run. Older releases URI-encode run text; text that is
 * not valid URI encoding is returned unchanged.
 */
export function decodeRunText(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Groups runs into lines, top to bottom. A line starts at its topmost run;
 * a run joins it while it sits within `tolerance` below that run.
 */
export function groupRunsIntoLines(
  runs: readonly TextRun[],
  tolerance: number = LINE_TOLERANCE
): TextLine[] {
  const sorted = runs.filter((run) => run.text.trim()).sort((a, b) => a.y - b.y);
  const lines: TextLine[] = [];
  let current: TextLine | null = null;

  for (const run of sorted) {
    if (current === null || run.y - current.y > tolerance) {
      current = { y: run.y, runs: [] };
      lines.push(current);
    }
    current.runs.push(run);
  }

  for (const line of lines) {
    line.runs.sort((a, b) => a.x - b.x);
  }

  return lines;
}

/**
 * Joins a page's lines into plain text, one line per text line.
 */
export function linesToText(lines: readonly TextLine[]): string {
  return lines
    .map((line) =>
      line.runs
        .map((run) => run.text.trim())
        .join(' ')
        .trim()
    )
    .filter(Boolean)
    .join('\n');
}

/**
 * Column anchors are the x-starts of the line with the most runs.
 */
export function findColumnAnchors(lines: readonly TextLine[]): number[] {
  let widest: TextLine | null = null;

  for (const line of lines) {
    if (widest === null || line.runs.length > widest.runs.length) {
      widest = line;
    }
  }

  return widest ? widest.runs.map((run) => run.x) : [];
}

const anchorIndex = (anchors: readonly number[], x: number): number => {
  let index = 0;
  anchors.forEach((anchor, i) => {
    if (anchor <= x + ANCHOR_TOLERANCE) {
      index = i;
    }
  });
  return index;
};

/**
 * Lays the page out as a single table, one row per line.
 *
 * @example
 * layoutTable(groupRunsIntoLines([
 *   { x: 1, y: 10, text: '№' }, { x: 3, y: 10, text: 'Товар' },
 *   { x: 1, y: 11, text: '1' }, { x: 3, y: 11, text: 'Сыр' }, { x: 5, y: 11, text: 'Гауда' },
 * ]))
 * // [['№', 'Товар', null], ['1', 'Сыр', 'Гауда']]
 */
export function layoutTable(lines: readonly TextLine[]): Table {
  const anchors = findColumnAnchors(lines);
  if (anchors.length === 0) {
    return [];
  }

  return lines.map((line): Row => {
    const cells: (string | null)[] = anchors.map(() => null);

    for (const run of line.runs) {
      const text = run.text.trim();
      if (!text) continue;

      const index = anchorIndex(anchors, run.x);
      const existing = cells[index];
      cells[index] = existing ? `${existing} ${text}` : text;
    }

    return cells;
  });
}
