export type DatabaseLogging =
  | boolean
  | 'all'
  | ('query' | 'error' | 'schema' | 'warn' | 'info' | 'log')[];

export type DatabaseConfig = {
  url?: string;
  host?: string;
  port?: number;
  password?: string;
  name?: string;
  username?: string;
  synchronize: boolean;
  maxConnections: number;
  sslEnabled: boolean;
  rejectUnauthorized: boolean;
  ca?: string;
  // false = no logging, true or 'all' = everything, array = selected kinds
  logging: DatabaseLogging;
};
