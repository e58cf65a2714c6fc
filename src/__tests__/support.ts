import { type LogEntry, Logger, LogLevel } from '../utils/logger';
import { RetryPolicy } from '../utils/retry';

/**
 * Logger that records entries instead of printing them
 */
export function captureLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger(level, {}, (entry) => {
    entries.push(entry);
  });
  return { logger, entries };
}

/**
 * Standard 1s/2s/4s schedule with sleeps recorded rather than awaited
 */
export function recordingRetry(maxAttempts = 4): { policy: RetryPolicy; delays: number[] } {
  const delays: number[] = [];
  const policy = new RetryPolicy({
    maxAttempts,
    initialDelay: 1000,
    maxDelay: 8000,
    factor: 2,
    jitter: 0,
    sleep: async (ms) => {
      delays.push(ms);
    }
  });
  return { policy, delays };
}
