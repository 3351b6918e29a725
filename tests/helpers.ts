/**
 * Shared test helpers
 */

import { Logger } from 'winston';
import { OutputStream } from '../src/types/dispatch';
import { createLogger } from '../src/utils/logger';

/**
 * Output stream that keeps everything written to it.
 */
export class MemoryStream implements OutputStream {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export function silentLogger(): Logger {
  return createLogger({ componentName: 'test', silent: true });
}
