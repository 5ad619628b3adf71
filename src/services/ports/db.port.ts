export interface DbQueryOptions {
  /**
   * Optional label for metrics/logging to indicate logical operation (e.g., selectAccountById).
   */
  operation?: string;
}

export type DbRow = Record<string, unknown>;

export interface DbPort {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  query(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<DbRow[]>;
  queryOne(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<DbRow | null>;
  insert(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<void>;
  update(
    tableFqn: string,
    id: string,
    patch: Record<string, unknown>,
    idColumn?: string,
    options?: DbQueryOptions
  ): Promise<void>;
  generateId(): string;
}
