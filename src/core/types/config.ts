export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TransportMode = 'stdio' | 'http';

export type Credential =
  | { mode: 'access_key'; accessKey: string }
  | { mode: 'basic'; email: string; password: string };

export interface ConnectionProfile {
  baseUrl: string;
  org: string;
  credential: Credential;
  timeoutSeconds: number;
}

export interface ResultLimits {
  maxRows: number;
  maxChars: number;
}

export interface HttpTransportConfig {
  host: string;
  port: number;
  path: string;
  stateless: boolean;
  authToken: string | null;
  authDisabled: boolean;
}

export interface ServerConfig {
  connection: ConnectionProfile;
  limits: ResultLimits;
  defaultStream: string;
  transport: TransportMode;
  http: HttpTransportConfig;
  logLevel: LogLevel;
}

/** Loosely-typed settings as they arrive from files, env, flags or a plugin host. */
export interface RawSettings {
  configPath?: string;
  baseUrl?: string;
  org?: string;
  email?: string;
  password?: string;
  accessKey?: string;
  timeout?: number | string;
  transport?: string;
  host?: string;
  port?: number | string;
  statelessHttp?: boolean;
  authToken?: string;
  authDisabled?: boolean;
  maxRows?: number | string;
  maxChars?: number | string;
  defaultStream?: string;
  logLevel?: string;
}
