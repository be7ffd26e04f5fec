import { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { query } from '@/config/database';

/**
 * Base Repository
 * Runs statements on the transaction client when one is bound, otherwise on the pool
 */
export abstract class BaseRepository {
  constructor(protected readonly client?: PoolClient) {}

  protected run<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    return this.client ? this.client.query<T>(text, params) : query<T>(text, params);
  }
}
