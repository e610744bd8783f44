/**
 * Blocked requests repository
 */

import type { DbBlockedRequestRow } from '../../types';
import { BaseRepository } from '../base.repository';
import { mapBlockedRequest, type BlockedRequest } from './blocked.model';
import { Q } from './blocked.query';
import { CreateBlockedRequestSchema, type CreateBlockedRequestInput } from './blocked.schema';

export class BlockedRequestsRepository extends BaseRepository {
  create(input: CreateBlockedRequestInput): BlockedRequest {
    const data = this.validate(CreateBlockedRequestSchema, input);
    const result = this.db.prepare(Q.insert).run(data);
    return { ...data, id: Number(result.lastInsertRowid) };
  }

  total(): number {
    return this.count(Q.count);
  }

  /**
   * Most recent blocked attempts, newest first.
   */
  getRecent(limit = 50): BlockedRequest[] {
    return this.db
      .prepare<{ limit: number }, DbBlockedRequestRow>(Q.selectRecent)
      .all({ limit })
      .map(mapBlockedRequest);
  }
}
