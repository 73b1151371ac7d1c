import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { contentHash, intakeDocument, IntakeError } from './intake.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'factsieve-intake-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('contentHash', () => {
  it('returns the first 12 hex characters of the SHA-256', () => {
    // sha256("abc") = ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad
    expect(contentHash(new TextEncoder().encode('abc'))).toBe('ba7816bf8f01');
  });
});

describe('intakeDocument', () => {
  it('copies the document under a content-derived name', () => {
    const source = join(tempDir, 'report.txt');
    writeFileSync(source, 'abc');
    const docsDir = join(tempDir, 'documents');

    const result = intakeDocument(source, docsDir);

    expect(result).toEqual({
      documentId: 'ba7816bf8f01',
      fileName: 'report.txt',
      storedPath: join(docsDir, 'ba7816bf8f01_report.txt'),
      content: 'abc',
    });
    expect(readFileSync(result.storedPath, 'utf-8')).toBe('abc');
  });

  it('replaces undecodable bytes', () => {
    const source = join(tempDir, 'binary.bin');
    writeFileSync(source, Buffer.from([0x68, 0x69, 0xff]));

    expect(intakeDocument(source, tempDir).content).toBe('hi\uFFFD');
  });

  it('rejects empty files', () => {
    const source = join(tempDir, 'empty.txt');
    writeFileSync(source, '');

    expect(() => intakeDocument(source, tempDir)).toThrow(IntakeError);
    expect(() => intakeDocument(source, tempDir)).toThrow(`File is empty: ${source}`);
  });

  it('rejects missing files', () => {
    const source = join(tempDir, 'nope.txt');
    expect(() => intakeDocument(source, tempDir)).toThrow(`File not found: ${source}`);
  });
});
