import type { LogLevel } from '../logging/logger.js';

export type LifespanMode = 'auto' | 'on' | 'off';

export interface ServerConfig {
  host: string;
  port: number;
  // Unix-domain socket path; replaces host/port when set
  uds: string | null;
  codec: string;
  lifespan: LifespanMode;
  rootPath: string;
  limitConcurrency: number | null;
  limitMaxRequests: number | null;
  limitRequestBody: number | null;
  timeoutKeepAliveMs: number;
  timeoutGracefulShutdownMs: number | null;
  readHighWater: number;
  readLowWater: number;
  writeHighWater: number;
  maxHeadSize: number;
  pipelineDepth: number;
  serverHeader: boolean;
  dateHeader: boolean;
  headers: Array<[string, string]>;
  accessLog: boolean;
  signals: NodeJS.Signals[];
  tickIntervalMs: number;
  logLevel: LogLevel;
  logFile: string | null;
}
