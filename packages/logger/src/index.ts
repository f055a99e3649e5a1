import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import pino, { multistream, type Level, type Logger as PinoLogger, type StreamEntry } from 'pino';
import { z } from 'zod';

const packageDirectory = fileURLToPath(new URL('.', import.meta.url));
const repositoryRoot = path.resolve(packageDirectory, '..', '..', '..');

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export type Logger = PinoLogger;

export interface LoggerOptions {
  env?: NodeJS.ProcessEnv;
  /** Mirror records to stdout. */
  stdout?: boolean;
  /** Install unhandled-rejection and before-exit handlers on `process`. */
  processHandlers?: boolean;
}

interface ManagedLogger {
  logger: Logger;
  fileStream: fs.WriteStream | null;
  filePath: string | null;
  cleanup: () => void;
}

const managedLoggers = new Map<string, ManagedLogger>();

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): Level {
  const parsed = LogLevel.safeParse((env.LOG_LEVEL ?? '').trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

export function resolveLogRoot(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.LOG_DIR?.trim();
  if (configured && configured.length > 0) {
    return path.resolve(configured);
  }
  return path.join(repositoryRoot, 'logs');
}

/** `LOG_TO_FILE=0` disables the file sink; anything else keeps it. */
export function shouldWriteLogFile(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.LOG_TO_FILE?.trim() !== '0';
}

function createRunFileName(): string {
  const iso = new Date().toISOString().replace(/[:.]/g, '-');
  return `run-${iso}-${process.pid}.log`;
}

function openServiceLogFile(
  serviceName: string,
  env: NodeJS.ProcessEnv,
): { filePath: string; stream: fs.WriteStream } {
  const serviceDir = path.join(resolveLogRoot(env), serviceName);
  fs.mkdirSync(serviceDir, { recursive: true });

  const filePath = path.join(serviceDir, createRunFileName());
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return { filePath, stream };
}

function registerProcessHandlers(logger: Logger): () => void {
  const handleRejection = (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled promise rejection');
    process.exitCode = 1;
  };

  const handleBeforeExit = (code: number) => {
    logger.debug({ code }, 'Process exiting');
    logger.flush();
  };

  process.on('unhandledRejection', handleRejection);
  process.on('beforeExit', handleBeforeExit);

  return () => {
    process.off('unhandledRejection', handleRejection);
    process.off('beforeExit', handleBeforeExit);
  };
}

/**
 * One pino logger per service name, writing JSON lines to stdout and, unless
 * disabled, to `<LOG_DIR>/<service>/run-<timestamp>-<pid>.log`.
 */
export function makeLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  const existing = managedLoggers.get(serviceName);
  if (existing) {
    return existing.logger;
  }

  const env = options.env ?? process.env;
  const level = resolveLogLevel(env);
  const streams: StreamEntry[] = [];
  if (options.stdout ?? true) {
    streams.push({ level, stream: process.stdout });
  }

  let file: { filePath: string; stream: fs.WriteStream } | null = null;
  if (shouldWriteLogFile(env)) {
    file = openServiceLogFile(serviceName, env);
    streams.push({ level, stream: file.stream });
  }

  const logger = pino(
    {
      level,
      base: {
        service: serviceName,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  const cleanup = (options.processHandlers ?? true) ? registerProcessHandlers(logger) : () => undefined;
  managedLoggers.set(serviceName, {
    logger,
    fileStream: file?.stream ?? null,
    filePath: file?.filePath ?? null,
    cleanup,
  });

  return logger;
}

export function getLogFilePath(serviceName: string): string | null {
  return managedLoggers.get(serviceName)?.filePath ?? null;
}

/** Detach handlers and close the file sink; resolves once the file is flushed. */
export async function closeLogger(serviceName: string): Promise<void> {
  const entry = managedLoggers.get(serviceName);
  if (!entry) {
    return;
  }
  managedLoggers.delete(serviceName);
  entry.cleanup();

  const stream = entry.fileStream;
  if (!stream || stream.destroyed) {
    return;
  }
  await new Promise<void>((resolve, reject) => {
    stream.once('error', reject);
    stream.end(() => resolve());
  });
}
