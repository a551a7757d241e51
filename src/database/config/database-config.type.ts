export type DatabaseConfig = {
  url?: string;
  type?: string;
  host?: string;
  port?: number;
  password?: string;
  name?: string;
  username?: string;
  synchronize?: boolean;
  maxConnections: number;
  sslEnabled?: boolean;
  rejectUnauthorized?: boolean;
  ca?: string;
  // Can be: false | true | 'all' | ['query', 'error', 'schema', 'warn', 'info', 'log']
  logging?: boolean | 'all' | DatabaseLogLevel[];
};

export type DatabaseLogLevel =
  | 'query'
  | 'error'
  | 'schema'
  | 'warn'
  | 'info'
  | 'log';
