export type Dialect = 'sqlite' | 'mysql';

export type SqlValue = string | number | boolean | null;

export type Row = Record<string, unknown>;

export interface ExecuteResult {
  insertId: number;
  affectedRows: number;
}

/**
 * One open connection. Every value reaches the driver as a bound
 * parameter; SQL text is never built from caller input.
 */
export interface Database {
  readonly dialect: Dialect;
  query(sql: string, params?: readonly SqlValue[]): Promise<Row[]>;
  execute(sql: string, params?: readonly SqlValue[]): Promise<ExecuteResult>;
  close(): Promise<void>;
}

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
