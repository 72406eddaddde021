import * as fs from 'fs/promises';
import * as path from 'path';
import type { PlannerEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL trace file and forwards levelled
 * messages to a console logger.
 */
export class JsonlLogger implements Logger {
  private dirReady = false;

  constructor(
    private readonly filePath: string,
    private readonly sink: Logger,
  ) {}

  async log(event: PlannerEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Trace write failures are reported, never thrown.
      await this.sink.error(
        error instanceof Error ? error : new Error(String(error)),
        `Failed to write to trace file at ${this.filePath}`,
      );
    }
  }

  debug(message: string) {
    return this.sink.debug(message);
  }

  info(message: string) {
    return this.sink.info(message);
  }

  warn(message: string) {
    return this.sink.warn(message);
  }

  error(error: Error, message?: string) {
    return this.sink.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.sink.child(bindings));
  }
}
