/**
 * CLI Logger
 * 
 * Everything at the configured level goes to the log file; warnings and
 * errors are echoed to stderr. Console progress is printed separately.
 */

import pino from 'pino';
import { config } from '../config/index.js';

const logFile = pino.destination({ dest: config.logFile, mkdir: true, sync: false });

logFile.on('error', (error: Error) => {
  process.stderr.write(`Cannot write log file ${config.logFile}: ${error.message}\n`);
});

export const logger = pino(
  {
    level: config.logLevel,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'cruise-packager-cli',
      env: config.nodeEnv,
    },
  },
  pino.multistream([
    { level: config.logLevel, stream: logFile },
    { level: 'warn', stream: process.stderr },
  ])
);
