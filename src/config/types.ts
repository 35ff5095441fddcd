import type { FilterThresholds } from '../types/media.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ScanConfig {
  directory: string;
  extensions: string[];
  ffprobePath: string;
}

export interface ManifestConfig {
  outputPath: string;
  baseUrl: string;
}

export interface SchedulerConfig {
  loopSeconds: number; // 0 = single pass
}

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  scan: ScanConfig;
  manifest: ManifestConfig;
  filter: FilterThresholds;
  scheduler: SchedulerConfig;
  logging: LoggingConfig;
  verbose: boolean;
}
