import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, join } from 'node:path';

export const CONTENT_HASH_LENGTH = 12;

export interface IntakeResult {
  /** First 12 hex characters of the SHA-256 of the document bytes. */
  documentId: string;
  fileName: string;
  /** Where the copy under the documents directory was written. */
  storedPath: string;
  /** Document text; undecodable bytes become U+FFFD. */
  content: string;
}

export class IntakeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntakeError';
  }
}

export function contentHash(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex').slice(0, CONTENT_HASH_LENGTH);
}

/**
 * Reads a document, derives its id from the content and copies it to
 * `<documentsDir>/<hash>_<name>`.
 */
export function intakeDocument(filePath: string, documentsDir: string): IntakeResult {
  if (!existsSync(filePath)) {
    throw new IntakeError(`File not found: ${filePath}`);
  }

  const bytes = readFileSync(filePath);
  if (bytes.length === 0) {
    throw new IntakeError(`File is empty: ${filePath}`);
  }

  const fileName = basename(filePath);
  const documentId = contentHash(bytes);
  mkdirSync(documentsDir, { recursive: true });
  const storedPath = join(documentsDir, `${documentId}_${fileName}`);
  writeFileSync(storedPath, bytes);

  return {
    documentId,
    fileName,
    storedPath,
    content: new TextDecoder('utf-8').decode(bytes),
  };
}
