import type { Database as DatabaseInstance } from 'better-sqlite3';
import Database from 'better-sqlite3';
import { lexicalRecordSchema, type LexicalRecord } from '../types/annotation';
import { AnnotationError } from '../utils/annotationError';
import { logger } from '../utils/logger';
import type { LexicalStore } from './lexical-store';

export interface SqliteLexicalStoreConfig {
  databasePath?: string;
  database?: DatabaseInstance;
  /** Defaults to the ECDICT `stardict` table. */
  tableName?: string;
}

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Read-only lookups against an ECDICT-style SQLite database.
 */
export class SqliteLexicalStore implements LexicalStore {
  private readonly db: DatabaseInstance;
  private readonly ownsDatabase: boolean;
  private readonly selectRecord: Database.Statement;

  constructor(config: SqliteLexicalStoreConfig) {
    const tableName = config.tableName ?? 'stardict';
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new AnnotationError('INVALID_CONFIGURATION', `Invalid dictionary table name "${tableName}"`);
    }

    this.ownsDatabase = !config.database;
    this.db = config.database ?? this.openDatabase(config.databasePath);

    try {
      this.selectRecord = this.db.prepare(
        `SELECT word, phonetic, translation, exchange FROM ${tableName} WHERE word = ? COLLATE NOCASE LIMIT 1`,
      );
    } catch (error) {
      throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Dictionary table "${tableName}" is not readable`, {
        cause: error,
      });
    }
  }

  getRecord(word: string): LexicalRecord | undefined {
    const row: unknown = this.selectRecord.get(word.toLowerCase());
    if (row === undefined) {
      return undefined;
    }

    const parsed = lexicalRecordSchema.safeParse(row);
    if (!parsed.success) {
      logger.debug({ word, issues: parsed.error.issues }, 'Skipping malformed dictionary row');
      return undefined;
    }
    return parsed.data;
  }

  close(): void {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }

  private openDatabase(databasePath: string | undefined): DatabaseInstance {
    if (!databasePath) {
      throw new AnnotationError('COLLABORATOR_UNAVAILABLE', 'No dictionary database path configured');
    }
    try {
      return new Database(databasePath, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Cannot open dictionary database "${databasePath}"`, {
        cause: error,
      });
    }
  }
}
