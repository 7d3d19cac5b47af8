/**
 * Cross-package scenarios: text flowing through a chain of boxes.
 *
 * Each test writes into a first box, then keeps handing the unwritten remainder
 * to fresh boxes with the same configuration until nothing is left, and checks
 * what ended up on the pages.
 */

import { describe, expect, it } from 'vitest';
import type { FontMetricsProvider, UnwrittenContent } from '@textflow/contracts';
import { TextBox, unwrittenToLines, type TextBoxOptions } from '@textflow/layout-engine';
import { createFixedPitchMetrics, createGlyphTableMetrics, loadSampleGlyphTable } from '@textflow/measuring';
import type { PaintedRun } from '@textflow/painter-display-list';
import { stripFormatting } from '@textflow/style-engine';

const MAX_BOXES = 100;

const HARBOR = [
  'Morning fog settled over the harbor while the ferry crews checked their ropes,',
  'counted the crates stacked along the pier and argued about whether the weather',
  'would lift before the first bell. Nobody expected the lighthouse keeper to walk',
  'down with a basket of warm bread, yet there he was, waving at the gulls.',
].join(' ');

const FORMATTED = [
  'The <b>signal lamp</b> blinked twice, then <i>stopped.</i>',
  'Out on the water a <b>small <i>rowing boat</b> drifted</i> past the buoys,',
  'its oars tucked away and its owner <i>fast asleep</i> under a wool blanket.\n',
  'By noon the <b>market</b> had opened and the smell of smoked fish filled every lane.',
].join(' ');

const glyphs = createGlyphTableMetrics(loadSampleGlyphTable());

type Chain = { boxes: TextBox[]; leftover: UnwrittenContent | undefined };

function chain(first: TextBox, rest: UnwrittenContent | undefined): Chain {
  const boxes = [first];
  let pending = rest;
  while (pending !== undefined && boxes.length < MAX_BOXES) {
    const next = TextBox.newInstanceWithSameConfig(boxes[boxes.length - 1]);
    boxes.push(next);
    pending = next.continueParagraph(pending);
  }
  return { boxes, leftover: pending };
}

const words = (text: string): string[] => text.split(/\s+/).filter((word) => word.length > 0);
const writtenWords = (boxes: TextBox[]): string[] => boxes.flatMap((box) => box.writtenLines().flatMap(words));

/** Runs of one box grouped into rows, top to bottom. */
function rows(box: TextBox): PaintedRun[][] {
  const byY = new Map<number, PaintedRun[]>();
  for (const run of box.render().runs) {
    const row = byY.get(run.y) ?? [];
    row.push(run);
    byY.set(run.y, row);
  }
  return [...byY.values()];
}

const rightEdge = (run: PaintedRun, metrics: FontMetricsProvider): number =>
  run.x + metrics.width(run.text, run.style, run.size);

const options = (overrides: Partial<TextBoxOptions> = {}): TextBoxOptions => ({
  size: { width: 240, height: 80 },
  font: glyphs,
  fontSize: 12,
  paragraphIndent: 24,
  newLineIndent: 6,
  ...overrides,
});

describe('continuation chains', () => {
  it('reproduces a justified paragraph word for word across boxes', () => {
    const first = new TextBox(options());
    const { boxes, leftover } = chain(first, first.writeParagraph(HARBOR, { justify: true }));

    expect(leftover).toBeUndefined();
    expect(boxes.length).toBeGreaterThan(1);
    expect(writtenWords(boxes)).toEqual(words(HARBOR));
  });

  it('lands every stretched line on the right edge and indents every row', () => {
    const first = new TextBox(options());
    const { boxes } = chain(first, first.writeParagraph(HARBOR, { justify: true }));
    const allRows = boxes.flatMap(rows);

    allRows.forEach((row, index) => {
      expect(row[0].x).toBe(index === 0 ? 24 : 6);
      const isLast = index === allRows.length - 1;
      if (isLast || row.length < 2) return;
      expect(rightEdge(row[row.length - 1], glyphs)).toBeCloseTo(240, 6);
    });
  });

  it('never lets an unjustified row overflow the writable width', () => {
    const first = new TextBox(options());
    const { boxes } = chain(first, first.writeParagraph(HARBOR));

    for (const row of boxes.flatMap(rows)) {
      expect(rightEdge(row[row.length - 1], glyphs)).toBeLessThanOrEqual(240 + 1e-6);
    }
  });

  it('keeps every word in its style when formatted text spans boxes', () => {
    const reference = new TextBox(options({ size: { width: 240, height: 10_000 } }));
    expect(reference.writeParagraph(FORMATTED, { formatting: true })).toBeUndefined();
    const expected = reference.render().runs.map((run) => [run.text, run.style]);

    const first = new TextBox(options());
    const { boxes, leftover } = chain(first, first.writeParagraph(FORMATTED, { formatting: true }));

    expect(leftover).toBeUndefined();
    expect(boxes.flatMap((box) => box.render().runs.map((run) => [run.text, run.style]))).toEqual(expected);
    expect(writtenWords(boxes)).toEqual(words(stripFormatting(FORMATTED)));
  });

  it('picks word-mode output up where the first box stopped', () => {
    const mono = createFixedPitchMetrics({ id: 'mono', advance: 0.5, lineHeight: 1.5 });
    const first = new TextBox(options({ font: mono, size: { width: 150, height: 60 } }));
    const { boxes, leftover } = chain(first, first.write(HARBOR));

    expect(leftover).toBeUndefined();
    expect(writtenWords(boxes)).toEqual(words(HARBOR));
  });

  it('splits a paragraph between written lines and the remainder without overlap', () => {
    const first = new TextBox(options());
    const rest = first.writeParagraph(HARBOR);
    if (rest === undefined) throw new Error('expected unwritten content');

    const pending = unwrittenToLines(rest).flatMap(words);
    expect(pending.length).toBeGreaterThan(0);
    expect([...writtenWords([first]), ...pending]).toEqual(words(HARBOR));
  });
});
