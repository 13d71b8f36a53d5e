/**
 * Shared types for the reconciler agents.
 */

export interface AgentContext {
  timestamp: Date;
}

export interface AgentResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  duration: number;
}

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AgentLog {
  timestamp: Date;
  level: LogLevel;
  message: string;
  data?: unknown;
}
