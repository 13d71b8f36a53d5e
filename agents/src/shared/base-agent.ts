/**
 * Base agent: validates input, runs, validates output, and keeps a log of the run.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { AgentConfig, AgentContext, AgentLog, AgentResult, LogLevel } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Lowest level echoed to the console; LOG_LEVEL, or errors only when unset. */
export function consoleThreshold(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(configured) ? configured : 'error';
}

/**
 * `TRawInput` is what callers may pass before the input schema fills defaults.
 */
export abstract class BaseAgent<TInput, TOutput, TRawInput = TInput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, TRawInput>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];

  protected log(level: LogLevel, message: string, data?: unknown): void {
    this.logs.push({ timestamp: new Date(), level, message, data });

    if (LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(consoleThreshold())) {
      console.log(`[${this.config.name}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  async execute(input: TRawInput): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();
    this.logs = [];
    const context: AgentContext = { timestamp: new Date() };

    this.info(`Starting ${this.config.name} v${this.config.version}`);

    try {
      const output = await this.run(this.inputSchema.parse(input), context);
      const validatedOutput = this.outputSchema.parse(output);

      const duration = Date.now() - startTime;
      this.info(`Completed successfully`, { duration });
      return { success: true, data: validatedOutput, duration };
    } catch (err) {
      const duration = Date.now() - startTime;
      const errorMessage = err instanceof Error ? err.message : String(err);

      this.error(`Execution failed: ${errorMessage}`, err);
      return { success: false, error: errorMessage, duration };
    }
  }

  /**
   * Core agent logic, called with validated input.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}
