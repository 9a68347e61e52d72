/**
 * Viewport Tests
 */

import { describe, test, expect } from 'vitest';
import { Viewport, BAR_ROWS } from '../../../src/ui/viewport.ts';
import { Document } from '../../../src/core/document.ts';

describe('Viewport', () => {
  test('leaves room for the status and message bars', () => {
    const viewport = Viewport.forTerminal({ width: 80, height: 24 });
    expect(viewport.screenRows).toBe(24 - BAR_ROWS);
    expect(viewport.screenCols).toBe(80);
    expect(viewport.rowOff).toBe(0);
    expect(viewport.colOff).toBe(0);
  });

  test('never drops below one text row', () => {
    const viewport = Viewport.forTerminal({ width: 1, height: 1 });
    expect(viewport.screenRows).toBe(1);
    expect(viewport.screenCols).toBe(1);
  });

  describe('scroll', () => {
    const doc = Document.fromText(Array.from({ length: 30 }, () => '\tabc').join('\n'));

    test('does nothing while the cursor is visible', () => {
      const viewport = new Viewport(10, 20);
      expect(viewport.scroll({ cx: 0, cy: 5 }, doc)).toBe(0);
      expect(viewport.rowOff).toBe(0);
      expect(viewport.colOff).toBe(0);
    });

    test('scrolls up to a cursor above the window', () => {
      const viewport = new Viewport(10, 20);
      viewport.rowOff = 12;
      viewport.scroll({ cx: 0, cy: 4 }, doc);
      expect(viewport.rowOff).toBe(4);
    });

    test('scrolls down so the cursor sits on the last visible row', () => {
      const viewport = new Viewport(10, 20);
      viewport.scroll({ cx: 0, cy: 25 }, doc);
      expect(viewport.rowOff).toBe(16);
    });

    test('allows the cursor one row past the end', () => {
      const viewport = new Viewport(10, 20);
      expect(viewport.scroll({ cx: 0, cy: 30 }, doc)).toBe(0);
      expect(viewport.rowOff).toBe(21);
    });

    test('scrolls columns by rendered position', () => {
      const viewport = new Viewport(10, 5);
      const rx = viewport.scroll({ cx: 3, cy: 0 }, doc);
      expect(rx).toBe(10);
      expect(viewport.colOff).toBe(6);

      viewport.scroll({ cx: 0, cy: 0 }, doc);
      expect(viewport.colOff).toBe(0);
    });
  });
});
