import { describe, expect, it } from 'vitest';
import { LayoutError } from '../errors';
import { FixedAdvanceMeasurer, TEST_FONT } from '../testing/fixtures';
import {
  ELLIPSIS,
  composeTypeLine,
  fitParagraph,
  fitSingleLine,
  lineHeightFor,
  sizeSteps,
  wrapText,
} from './TextLayouter';

const measurer = new FixedAdvanceMeasurer();

describe('sizeSteps', () => {
  it('counts down in steps and ends on the floor', () => {
    expect(sizeSteps({ start: 30, step: 4, floor: 20 })).toEqual([30, 26, 22, 20]);
    expect(sizeSteps({ start: 24, step: 2, floor: 20 })).toEqual([24, 22, 20]);
  });

  it('yields only the floor when start equals floor', () => {
    expect(sizeSteps({ start: 20, step: 2, floor: 20 })).toEqual([20]);
  });

  it('rejects ranges that cannot terminate', () => {
    expect(() => sizeSteps({ start: 10, step: 2, floor: 20 })).toThrow(LayoutError);
    expect(() => sizeSteps({ start: 30, step: 0, floor: 20 })).toThrow(LayoutError);
    expect(() => sizeSteps({ start: 30, step: 2, floor: 0 })).toThrow(LayoutError);
  });
});

describe('fitSingleLine', () => {
  const sizes = { start: 40, step: 2, floor: 20 };

  it('keeps the starting size when the text fits', () => {
    expect(fitSingleLine('HELLO', 100, TEST_FONT, sizes, measurer)).toEqual({
      text: 'HELLO',
      fontSize: 40,
      width: 100,
      truncated: false,
    });
  });

  it('shrinks to the largest size that fits', () => {
    const line = fitSingleLine('ABCDEFGH', 100, TEST_FONT, sizes, measurer);
    expect(line.fontSize).toBe(24);
    expect(line.width).toBe(96);
    expect(line.truncated).toBe(false);
  });

  it('ellipsizes at the floor when nothing fits', () => {
    expect(fitSingleLine('HELLO WORLD', 100, TEST_FONT, sizes, measurer)).toEqual({
      text: `HELLO WOR${ELLIPSIS}`,
      fontSize: 20,
      width: 100,
      truncated: true,
    });
  });
});

describe('composeTypeLine', () => {
  it('joins type and subtype with a spaced dash', () => {
    expect(composeTypeLine('Creature', 'Bear')).toBe('Creature — Bear');
  });

  it('omits the separator without a subtype', () => {
    expect(composeTypeLine('Spell')).toBe('Spell');
    expect(composeTypeLine('Spell', '')).toBe('Spell');
  });
});

describe('wrapText', () => {
  // size 10: 5 px per character
  it('fills lines greedily', () => {
    expect(wrapText('aaa bbb ccc', 40, TEST_FONT, 10, measurer)).toEqual(['aaa bbb', 'ccc']);
  });

  it('treats newlines as hard breaks', () => {
    expect(wrapText('one\n\ntwo', 40, TEST_FONT, 10, measurer)).toEqual(['one', '', 'two']);
  });

  it('breaks words wider than the box between characters', () => {
    expect(wrapText('abcdefghijkl', 25, TEST_FONT, 10, measurer)).toEqual(['abcde', 'fghij', 'kl']);
  });

  it('returns no lines for blank text', () => {
    expect(wrapText('   ', 40, TEST_FONT, 10, measurer)).toEqual([]);
  });

  it('never produces a line wider than the box', () => {
    const text = 'Whenever this creature attacks, each opponent loses one life and you gain that much life.';
    for (const width of [30, 55, 80, 200]) {
      for (const line of wrapText(text, width, TEST_FONT, 10, measurer)) {
        expect(measurer.measure(line, TEST_FONT, 10)).toBeLessThanOrEqual(width);
      }
    }
  });
});

describe('fitParagraph', () => {
  const sizes = { start: 10, step: 2, floor: 6 };
  const text = 'aaa bbb ccc ddd';

  it('keeps the starting size when the block fits', () => {
    expect(fitParagraph(text, { width: 40, height: 24 }, TEST_FONT, sizes, measurer)).toEqual({
      lines: ['aaa bbb', 'ccc ddd'],
      fontSize: 10,
      lineHeight: 12,
      truncated: false,
    });
  });

  it('re-wraps at smaller sizes until the block fits', () => {
    const fitted = fitParagraph(text, { width: 40, height: 20 }, TEST_FONT, sizes, measurer);
    expect(fitted.fontSize).toBe(8);
    expect(fitted.lineHeight).toBe(10);
    expect(fitted.lines).toEqual(['aaa bbb', 'ccc ddd']);
  });

  it('truncates with an ellipsis at the floor', () => {
    expect(fitParagraph(text, { width: 40, height: 12 }, TEST_FONT, sizes, measurer)).toEqual({
      lines: [`aaa bbb ccc${ELLIPSIS}`],
      fontSize: 6,
      lineHeight: 7,
      truncated: true,
    });
  });

  it('never goes below the floor or outside the box', () => {
    const long = Array.from({ length: 60 }, (_, i) => `word${i}`).join(' ');
    const box = { width: 120, height: 50 };
    const fitted = fitParagraph(long, box, TEST_FONT, sizes, measurer);

    expect(fitted.fontSize).toBe(6);
    expect(fitted.truncated).toBe(true);
    expect(fitted.lines.length * fitted.lineHeight).toBeLessThanOrEqual(box.height);
    expect(fitted.lines[fitted.lines.length - 1].endsWith(ELLIPSIS)).toBe(true);
  });

  it('is deterministic', () => {
    const box = { width: 60, height: 30 };
    expect(fitParagraph(text, box, TEST_FONT, sizes, measurer)).toEqual(
      fitParagraph(text, box, TEST_FONT, sizes, measurer),
    );
  });

  it('returns no lines for an empty description', () => {
    expect(fitParagraph('', { width: 40, height: 12 }, TEST_FONT, sizes, measurer)).toEqual({
      lines: [],
      fontSize: 10,
      lineHeight: 12,
      truncated: false,
    });
  });
});

describe('lineHeightFor', () => {
  it('rounds to whole pixels', () => {
    expect(lineHeightFor(34, 1.2)).toBe(41);
    expect(lineHeightFor(18, 1.2)).toBe(22);
  });
});
