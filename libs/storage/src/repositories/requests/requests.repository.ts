/**
 * Requests repository: relayed request log and traffic aggregates
 */

import type { DbBandwidthRow, DbDomainTotalsRow, DbRequestRow } from '../../types';
import { BaseRepository } from '../base.repository';
import {
  mapBandwidth,
  mapDomainTotals,
  mapRequest,
  type BandwidthStats,
  type DomainTotals,
  type TrafficRequest,
} from './requests.model';
import { Q } from './requests.query';
import { CreateTrafficRequestSchema, type CreateTrafficRequestInput } from './requests.schema';

export class RequestsRepository extends BaseRepository {
  /**
   * Store one relayed request.
   */
  create(input: CreateTrafficRequestInput): TrafficRequest {
    const data = this.validate(CreateTrafficRequestSchema, input);
    const result = this.db.prepare(Q.insert).run(data);
    return { ...data, id: Number(result.lastInsertRowid) };
  }

  /**
   * Total number of stored requests.
   */
  total(): number {
    return this.count(Q.count);
  }

  /**
   * Hosts by request count, busiest first; ties break alphabetically.
   */
  topDomains(limit = 10): DomainTotals[] {
    const rows = this.db.prepare<{ limit: number }, DbDomainTotalsRow>(Q.topDomains).all({ limit });
    return rows.map(mapDomainTotals);
  }

  bandwidth(): BandwidthStats {
    return mapBandwidth(this.db.prepare<[], DbBandwidthRow>(Q.bandwidth).get());
  }

  /**
   * All requests to one host, newest first.
   */
  getByHost(host: string): TrafficRequest[] {
    return this.db.prepare<[string], DbRequestRow>(Q.selectByHost).all(host).map(mapRequest);
  }

  /**
   * Every stored request in insertion order.
   */
  getAll(): TrafficRequest[] {
    return this.db.prepare<[], DbRequestRow>(Q.selectAll).all().map(mapRequest);
  }
}
