/**
 * Structured Logger with Pino
 *
 * - JSON logging, ISO timestamps, level labels
 * - Pretty console output in development
 * - Optional daily rotated log file (LOG_TO_FILE=true)
 * - Secret redaction (API keys, bearer headers, credentials)
 */

import { pino, multistream, type DestinationStream, type Level, type StreamEntry } from 'pino';
import * as rfs from 'rotating-file-stream';
import { PinoPretty } from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

function createFileStream(): DestinationStream | undefined {
  if (!config.toFile) return undefined;

  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  return rfs.createStream('tagger.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const fileStream = createFileStream();

// Stream entries take pino's concrete levels; 'silent' is applied on the logger itself
const streamLevel: Level = config.level === 'silent' ? 'fatal' : config.level;

const streams: StreamEntry[] = [
  // Console output
  ...(config.console ? [{
    level: streamLevel,
    stream: config.pretty
      ? PinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  }] : []),

  ...(fileStream ? [{
    level: streamLevel,
    stream: fileStream,
  }] : []),
];

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  multistream(streams)
);

