import {
  LogContext,
  type Context,
  type LogLevel,
  type LogSink,
} from '@rocicorp/logger';

export class SilentLogSink implements LogSink {
  log(_level: LogLevel, _context: Context | undefined, ..._args: unknown[]) {}
}

export class TestLogSink implements LogSink {
  messages: [LogLevel, Context | undefined, unknown[]][] = [];

  log(level: LogLevel, context: Context | undefined, ...args: unknown[]): void {
    this.messages.push([level, context, args]);
  }
}

export function createSilentLogContext() {
  return new LogContext('error', undefined, new SilentLogSink());
}

export function createTestLogContext(level: LogLevel = 'debug') {
  const sink = new TestLogSink();
  return {lc: new LogContext(level, undefined, sink), sink};
}
