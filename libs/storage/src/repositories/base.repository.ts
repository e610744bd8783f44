/**
 * Abstract base repository
 *
 * Provides common utilities: DB access, Zod validation, timestamps.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ValidationError } from '../errors';

export abstract class BaseRepository {
  constructor(protected readonly db: Database.Database) {}

  /**
   * Validate data against a Zod schema. Throws ValidationError on failure.
   */
  protected validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(
        `Validation failed: ${result.error.message}`,
        result.error.issues,
      );
    }
    return result.data;
  }

  /**
   * Get current ISO datetime string.
   */
  protected now(): string {
    return new Date().toISOString();
  }

  /**
   * Count rows with a prepared `SELECT COUNT(*) AS count` statement.
   */
  protected count(sql: string): number {
    const row = this.db.prepare<[], { count: number }>(sql).get();
    return row?.count ?? 0;
  }
}
