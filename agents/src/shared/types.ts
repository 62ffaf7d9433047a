/**
 * Shared types for all stages.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StageLogEntry {
  timestamp: Date;
  scope: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}
