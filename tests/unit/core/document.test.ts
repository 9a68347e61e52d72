/**
 * Document Tests
 */

import { describe, test, expect } from 'vitest';
import { Document, stripLineEnding } from '../../../src/core/document.ts';

function rowTexts(doc: Document): string[] {
  const texts: string[] = [];
  for (let i = 0; i < doc.numRows; i++) {
    texts.push(doc.getRow(i)?.chars ?? '');
  }
  return texts;
}

describe('Document', () => {
  // ─────────────────────────────────────────────────────────────────────────
  // Loading & Serialization
  // ─────────────────────────────────────────────────────────────────────────

  describe('loading', () => {
    test('fromText splits rows and starts clean', () => {
      const doc = Document.fromText('foo\nbar\n');
      expect(rowTexts(doc)).toEqual(['foo', 'bar']);
      expect(doc.isDirty()).toBe(false);
    });

    test('strips carriage returns on load', () => {
      const doc = Document.fromText('one\r\ntwo\r\n');
      expect(rowTexts(doc)).toEqual(['one', 'two']);
    });

    test('keeps a last line without newline', () => {
      const doc = Document.fromText('a\nb');
      expect(rowTexts(doc)).toEqual(['a', 'b']);
    });

    test('stripLineEnding removes only trailing newline characters', () => {
      expect(stripLineEnding('x\r\n')).toBe('x');
      expect(stripLineEnding('a\rb\n')).toBe('a\rb');
    });

    test('rowsToText ends every row with a newline', () => {
      const doc = Document.fromText('a\n\nb\n');
      expect(doc.rowsToText()).toBe('a\n\nb\n');
    });

    test('rowsToText of an empty document is empty', () => {
      expect(new Document().rowsToText()).toBe('');
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Row Operations
  // ─────────────────────────────────────────────────────────────────────────

  describe('row operations', () => {
    test('insertRow clamps the position', () => {
      const doc = Document.fromText('a\nb\n');
      doc.insertRow(99, 'last');
      doc.insertRow(-5, 'first');
      expect(rowTexts(doc)).toEqual(['first', 'a', 'b', 'last']);
      expect(doc.dirty).toBe(2);
    });

    test('deleteRow out of range changes nothing', () => {
      const doc = Document.fromText('a\n');
      doc.deleteRow(5);
      expect(doc.numRows).toBe(1);
      expect(doc.isDirty()).toBe(false);
    });

    test('deleteRow removes the row', () => {
      const doc = Document.fromText('a\nb\nc\n');
      doc.deleteRow(1);
      expect(rowTexts(doc)).toEqual(['a', 'c']);
      expect(doc.isDirty()).toBe(true);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Editing
  // ─────────────────────────────────────────────────────────────────────────

  describe('insertChar', () => {
    test('inserts at the cursor and advances it', () => {
      const doc = Document.fromText('foo\nbar\n');
      const pos = doc.insertChar({ cx: 0, cy: 0 }, 'X');
      expect(doc.getRow(0)?.chars).toBe('Xfoo');
      expect(doc.isDirty()).toBe(true);
      expect(pos).toEqual({ cx: 1, cy: 0 });
    });

    test('typing past the last row appends a row', () => {
      const doc = new Document();
      const pos = doc.insertChar({ cx: 0, cy: 0 }, 'a');
      expect(rowTexts(doc)).toEqual(['a']);
      expect(pos).toEqual({ cx: 1, cy: 0 });
    });

    test('clamps an out-of-range column', () => {
      const doc = Document.fromText('ab\n');
      const pos = doc.insertChar({ cx: 10, cy: 0 }, 'c');
      expect(doc.getRow(0)?.chars).toBe('abc');
      expect(pos).toEqual({ cx: 3, cy: 0 });
    });

    test('keeps render and highlight in step with raw', () => {
      const doc = Document.fromText('x\n');
      doc.insertChar({ cx: 0, cy: 0 }, '\t');
      const row = doc.getRow(0);
      expect(row?.render).toBe('        x');
      expect(row?.hl.length).toBe(9);
    });
  });

  describe('deleteChar', () => {
    test('does nothing at the start of the document', () => {
      const doc = Document.fromText('ab\n');
      const pos = doc.deleteChar({ cx: 0, cy: 0 });
      expect(pos).toEqual({ cx: 0, cy: 0 });
      expect(doc.getRow(0)?.chars).toBe('ab');
      expect(doc.isDirty()).toBe(false);
    });

    test('does nothing past the last row', () => {
      const doc = Document.fromText('ab\n');
      const pos = doc.deleteChar({ cx: 0, cy: 1 });
      expect(pos).toEqual({ cx: 0, cy: 1 });
      expect(doc.numRows).toBe(1);
    });

    test('deletes the character before the cursor', () => {
      const doc = Document.fromText('abc\n');
      const pos = doc.deleteChar({ cx: 2, cy: 0 });
      expect(doc.getRow(0)?.chars).toBe('ac');
      expect(pos).toEqual({ cx: 1, cy: 0 });
    });

    test('joins onto the previous row at column 0', () => {
      const doc = Document.fromText('ab\ncd\n');
      const pos = doc.deleteChar({ cx: 0, cy: 1 });
      expect(rowTexts(doc)).toEqual(['abcd']);
      expect(doc.numRows).toBe(1);
      expect(pos).toEqual({ cx: 2, cy: 0 });
    });
  });

  describe('insertNewline', () => {
    test('at column 0 inserts an empty row above', () => {
      const doc = Document.fromText('abc\n');
      const pos = doc.insertNewline({ cx: 0, cy: 0 });
      expect(rowTexts(doc)).toEqual(['', 'abc']);
      expect(pos).toEqual({ cx: 0, cy: 1 });
    });

    test('splits the row at the cursor', () => {
      const doc = Document.fromText('abcdef\n');
      const pos = doc.insertNewline({ cx: 2, cy: 0 });
      expect(rowTexts(doc)).toEqual(['ab', 'cdef']);
      expect(pos).toEqual({ cx: 0, cy: 1 });
    });

    test('split then join reproduces the original bytes', () => {
      const original = 'in\tt x = "\x01é";';
      const doc = Document.fromText(original + '\n');
      const pos = doc.insertNewline({ cx: 5, cy: 0 });
      doc.deleteChar(pos);
      expect(rowTexts(doc)).toEqual([original]);
    });
  });
});
