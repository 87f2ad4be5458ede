/**
 * Logging utility for the services registry
 * Provides configurable logging for different components
 */

export interface LoggingConfig {
  enableRegistryLogs?: boolean;
  enableBridgeLogs?: boolean;
  enableDetectorLogs?: boolean;
  enableTestMode?: boolean;
}

/**
 * Channels every component logs through. Tests substitute a spy.
 */
export interface ServiceLogger {
  registry(message: string, ...args: unknown[]): void;
  bridges(message: string, ...args: unknown[]): void;
  detectors(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export class FrameworkLogger implements ServiceLogger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log membership registry messages
   */
  registry(message: string, ...args: unknown[]): void {
    if (this.config.enableRegistryLogs && !this.config.enableTestMode) {
      console.log(`[REGISTRY] ${message}`, ...args);
    }
  }

  /**
   * Log bridge pool messages
   */
  bridges(message: string, ...args: unknown[]): void {
    if (this.config.enableBridgeLogs && !this.config.enableTestMode) {
      console.log(`[BRIDGES] ${message}`, ...args);
    }
  }

  /**
   * Log brewery detector messages
   */
  detectors(message: string, ...args: unknown[]): void {
    if (this.config.enableDetectorLogs && !this.config.enableTestMode) {
      console.log(`[DETECTORS] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): FrameworkLogger {
  return new FrameworkLogger(config);
}
