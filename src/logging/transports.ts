/**
 * Logging Transports
 *
 * Winston transport wrappers. The text format prints one line per message:
 *   INFO  2026-02-10 14:30:15,042 [deploy] copy index.js -> index.js
 */

import winston from 'winston';
import { formatLocalDateTimeMillis } from '../util/DateFormat.js';
import type { LogFormat, TimestampFormat } from './config.js';

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Render one text log line from winston's info object.
 */
export function formatTextLine(
  info: winston.Logform.TransformableInfo,
  timestampFormat: TimestampFormat,
  now: Date = new Date()
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalDateTimeMillis(now);
  const component = info['component'];
  const componentPart = typeof component === 'string' ? ` [${component}]` : '';
  const errorStack = info['errorStack'];
  let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
  if (typeof errorStack === 'string') {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => formatTextLine(info, timestampFormat));
}

/**
 * Console transport — everything goes to stdout so progress and failures interleave in order.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    if (this.format === 'json') {
      return new winston.transports.Console({
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        stderrLevels: [],
      });
    }

    return new winston.transports.Console({
      format: buildTextFormat(this.timestampFormat),
      stderrLevels: [],
    });
  }
}

/**
 * File transport — writes to a log file with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    const formatCombine =
      this.format === 'json'
        ? winston.format.combine(winston.format.timestamp(), winston.format.json())
        : buildTextFormat('local');

    return new winston.transports.File({
      filename: this.filePath,
      format: formatCombine,
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
