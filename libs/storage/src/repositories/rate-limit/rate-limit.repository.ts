/**
 * Rate-limit violations repository
 */

import type { DbRateLimitViolationRow } from '../../types';
import { BaseRepository } from '../base.repository';
import { mapRateLimitViolation, type RateLimitViolation } from './rate-limit.model';
import { Q } from './rate-limit.query';
import { CreateRateLimitViolationSchema, type CreateRateLimitViolationInput } from './rate-limit.schema';

export class RateLimitViolationsRepository extends BaseRepository {
  create(input: CreateRateLimitViolationInput): RateLimitViolation {
    const data = this.validate(CreateRateLimitViolationSchema, input);
    const result = this.db.prepare(Q.insert).run(data);
    return { ...data, id: Number(result.lastInsertRowid) };
  }

  total(): number {
    return this.count(Q.count);
  }

  getBySource(sourceIp: string): RateLimitViolation[] {
    return this.db
      .prepare<[string], DbRateLimitViolationRow>(Q.selectBySource)
      .all(sourceIp)
      .map(mapRateLimitViolation);
  }
}
