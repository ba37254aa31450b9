/**
 * Structured Logging Utility
 *
 * One JSON object per line, tagged with level and the component that wrote it
 */

type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'VALIDATION';

type LogData = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: LogData;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

function log(entry: LogEntry): void {
  const logString = JSON.stringify(entry);

  switch (entry.level) {
    case 'ERROR':
      console.error(logString);
      break;
    case 'WARN':
      console.warn(logString);
      break;
    case 'INFO':
    case 'VALIDATION':
    default:
      console.log(logString);
      break;
  }
}

export const logger = {
  /**
   * Use for: general flow, successful operations
   */
  info(component: string, message: string, data?: LogData): void {
    log({ timestamp: new Date().toISOString(), level: 'INFO', component, message, data });
  },

  /**
   * Use for: recoverable problems, suspicious input
   */
  warn(component: string, message: string, data?: LogData): void {
    log({ timestamp: new Date().toISOString(), level: 'WARN', component, message, data });
  },

  /**
   * Use for: failures and exceptions
   */
  error(component: string, message: string, error: Error | null, data?: LogData): void {
    log({
      timestamp: new Date().toISOString(),
      level: 'ERROR',
      component,
      message,
      data,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : undefined
    });
  },

  /**
   * Use for: rejected submissions and other validation outcomes
   */
  validation(component: string, field: string, reason: string, data?: LogData): void {
    log({
      timestamp: new Date().toISOString(),
      level: 'VALIDATION',
      component,
      message: `${field}: ${reason}`,
      data
    });
  }
};

/**
 * Times an operation and logs its duration when ended
 *
 * @example
 * const timer = new PerformanceTimer('add-task', 'relay');
 * await gateway.addTask(payload);
 * timer.end({ taskName });
 */
export class PerformanceTimer {
  private startTime: number;

  constructor(
    private component: string,
    private operation: string
  ) {
    this.startTime = Date.now();
  }

  end(data?: LogData): number {
    const durationMs = Date.now() - this.startTime;
    logger.info(this.component, `Performance: ${this.operation}`, {
      ...data,
      durationMs
    });
    return durationMs;
  }
}
