import { z } from 'zod';
import type { ILoggerFactory, Logger } from '../../src/core/logging/index.js';
import { createRootLogger } from '../../src/core/logging/index.js';

const LineSchema = z.record(z.string(), z.unknown());

export type LogLine = z.infer<typeof LineSchema>;

/**
 * Real pino loggers writing JSON lines into memory.
 *
 * Lines go through the production redaction config, so tests can assert
 * what would actually be written.
 */
export class CapturingLoggerFactory implements ILoggerFactory {
  readonly lines: LogLine[] = [];
  readonly root: Logger;

  constructor() {
    this.root = createRootLogger('debug', {
      write: (line: string) => {
        this.lines.push(LineSchema.parse(JSON.parse(line)));
      },
    });
  }

  create(component: string): Logger {
    return this.root.child({ component });
  }

  // Test helpers
  withMessage(msg: string): LogLine[] {
    return this.lines.filter((l) => l['msg'] === msg);
  }
}
