import { jest } from '@jest/globals';
import type { LoggerPort } from '@vehicle-dash/domain';

export interface RecordingLogger extends LoggerPort {
  debug: jest.Mock<LoggerPort['debug']>;
  info: jest.Mock<LoggerPort['info']>;
  warn: jest.Mock<LoggerPort['warn']>;
  error: jest.Mock<LoggerPort['error']>;
}

/** Logger whose calls can be asserted; children share the same mocks */
export function recordingLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    debug: jest.fn<LoggerPort['debug']>(),
    info: jest.fn<LoggerPort['info']>(),
    warn: jest.fn<LoggerPort['warn']>(),
    error: jest.fn<LoggerPort['error']>(),
    child: () => logger,
  };
  return logger;
}

export const T0_MS = Date.UTC(2026, 0, 1);
