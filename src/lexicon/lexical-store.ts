import * as fs from 'fs';
import { z } from 'zod';
import { lexicalRecordSchema, type LexicalRecord } from '../types/annotation';
import { AnnotationError } from '../utils/annotationError';
import { logger } from '../utils/logger';

/**
 * Exact-match retrieval of dictionary records by lowercase word form.
 */
export interface LexicalStore {
  getRecord(word: string): LexicalRecord | undefined;
}

export class InMemoryLexicalStore implements LexicalStore {
  private readonly records = new Map<string, LexicalRecord>();

  constructor(records: Iterable<LexicalRecord> = []) {
    for (const record of records) {
      const key = record.word.toLowerCase();
      // First record for a word form wins, as with a database lookup
      if (!this.records.has(key)) {
        this.records.set(key, record);
      }
    }
  }

  getRecord(word: string): LexicalRecord | undefined {
    return this.records.get(word.toLowerCase());
  }

  get size(): number {
    return this.records.size;
  }
}

const recordListSchema = z.array(lexicalRecordSchema);

export const loadLexicalRecords = (filePath: string): InMemoryLexicalStore => {
  if (!fs.existsSync(filePath)) {
    throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Dictionary file not found at "${filePath}"`);
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Dictionary file "${filePath}" is not valid JSON`, {
      cause: error,
    });
  }

  const parsed = recordListSchema.safeParse(content);
  if (!parsed.success) {
    throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Dictionary file "${filePath}" has invalid records`, {
      cause: parsed.error,
    });
  }

  const store = new InMemoryLexicalStore(parsed.data);
  logger.info({ filePath, records: store.size }, 'Loaded dictionary records');
  return store;
};
