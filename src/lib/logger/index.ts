/**
 * Centralized Logger with SQLite Persistence
 *
 * This logger provides:
 * - Multiple log levels (debug, info, warn, error)
 * - SQLite persistence for all logs in a separate database
 * - Automatic log trimming to prevent database bloat
 * - Per-tag levels and disabled tags
 * - Built on react-native-logs for the level/transport plumbing
 * - Cached subloggers for improved performance
 *
 * Usage (direct):
 *   import { logger } from '@/lib/logger';
 *   logger.info('ProgressSyncService', 'Info message');
 *   logger.error('ProgressSyncService', 'Error message', error);
 *
 * Usage (cached sublogger - recommended for frequent logging):
 *   import { logger } from '@/lib/logger';
 *   const log = logger.forTag('ProgressSyncService');
 *   log.info('Info message');
 *   log.error('Error message', error);
 */

import { getLogLevelFromEnv, isDevelopment } from "@/lib/config";
import { consoleTransport, logger as rnLogger } from "react-native-logs";
import { v4 as uuidv4 } from "uuid";
import { deleteLogsBefore, insertLogToDb, vacuumDatabase } from "./db";
import type { LogLevel, SubLogger } from "./types";

export {
  clearAllLogs,
  closeLogsDb,
  getAllLogs,
  getAllTags,
  getErrorCount,
  getLogsByLevel,
  getLogsByTag,
  getWarningCount,
  openLogsDb,
} from "./db";
export type { LogRow } from "./db";
export type { LogEntry, LogLevel, SubLogger } from "./types";

const ONE_HOUR_MS = 60 * 60 * 1000;
const MIN_LOG_RETENTION_MS = ONE_HOUR_MS; // Always keep at least 1 hour of logs
const DEFAULT_LOG_RETENTION_MS = ONE_HOUR_MS;

const PURGE_EVERY_N_LOGS = 100;
const PURGE_INTERVAL_MS = 5 * 60 * 1000;

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentRetentionDurationMs = DEFAULT_LOG_RETENTION_MS;
let defaultLogLevel: LogLevel = getLogLevelFromEnv() ?? "info";
let logWriteCount = 0;
let lastPurgeTime = 0;

const clampRetentionDuration = (durationMs: number): number =>
  Math.max(durationMs, MIN_LOG_RETENTION_MS);

/**
 * Shape of the props react-native-logs hands to a transport
 */
interface TransportProps {
  rawMsg: unknown;
  level: { severity: number; text: string };
  extension?: string | null;
}

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_VALUES;

const formatArg = (arg: unknown): string => {
  if (arg instanceof Error) {
    if (isDevelopment && arg.stack) {
      return `Error: ${arg.message}\nStack: ${arg.stack}`;
    }
    return `Error: ${arg.message}`;
  }

  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }

  return String(arg);
};

/**
 * Join the raw log arguments into a single line. A leading string is kept
 * verbatim and the rest are appended.
 */
export const formatLogMessage = (rawMsg: unknown): string => {
  const args = Array.isArray(rawMsg) ? rawMsg : [rawMsg];
  const [first, ...rest] = args;
  if (typeof first === "string") {
    return rest.length > 0 ? `${first} ${rest.map(formatArg).join(" ")}` : first;
  }
  return args.map(formatArg).join(" ");
};

const trimOldLogs = (now: number): void => {
  deleteLogsBefore(new Date(now - currentRetentionDurationMs));
  vacuumDatabase();
  lastPurgeTime = now;
  logWriteCount = 0;
};

/**
 * Custom SQLite transport for react-native-logs
 */
const sqliteTransport = (props: TransportProps): void => {
  const { rawMsg, level, extension } = props;
  const logLevel = isLogLevel(level.text) ? level.text : "info";

  try {
    insertLogToDb({
      id: uuidv4(),
      timestamp: new Date(),
      level: logLevel,
      tag: extension || "App",
      message: formatLogMessage(rawMsg),
    });

    // Periodically trim old logs (every N logs or every N minutes)
    logWriteCount++;
    const now = Date.now();
    if (logWriteCount >= PURGE_EVERY_N_LOGS || now - lastPurgeTime >= PURGE_INTERVAL_MS) {
      trimOldLogs(now);
    }
  } catch (error) {
    console.error("[Logger] Failed to persist log entry:", error);
  }
};

/**
 * Get the minimum log level required based on default level and per-tag levels
 * This ensures react-native-logs doesn't filter out messages we want to handle per-tag
 */
const getMinimumSeverity = (tagLevelsMap?: Map<string, LogLevel>): LogLevel => {
  let minLevel: LogLevel = defaultLogLevel;
  if (!tagLevelsMap) return minLevel;

  for (const tagLevel of tagLevelsMap.values()) {
    if (LEVEL_VALUES[tagLevel] < LEVEL_VALUES[minLevel]) {
      minLevel = tagLevel;
    }
  }
  return minLevel;
};

const getConfig = (tagLevelsMap?: Map<string, LogLevel>) => ({
  levels: LEVEL_VALUES,
  severity: getMinimumSeverity(tagLevelsMap),
  transport: isDevelopment ? [consoleTransport, sqliteTransport] : [sqliteTransport],
  transportOptions: {
    colors: {
      debug: "blueBright" as const,
      info: "green" as const,
      warn: "yellow" as const,
      error: "red" as const,
    },
  },
  async: true,
  dateFormat: "iso" as const,
  printLevel: true,
  printDate: true,
  enabled: true,
});

// Recreated whenever the effective minimum severity changes
let rnLoggerInstance = rnLogger.createLogger(getConfig());

/**
 * Logger facade that provides a consistent API with cached subloggers
 */
class Logger {
  private static instance: Logger | null = null;
  private subLoggers: Map<string, SubLogger> = new Map();
  private disabledTags: Set<string> = new Set();
  private tagLevels: Map<string, LogLevel> = new Map();

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Get a cached sublogger for a specific tag
   *
   * The sublogger holds a reference to an extended logger that is refreshed
   * when rnLoggerInstance is recreated
   */
  forTag(tag: string): SubLogger {
    const cached = this.subLoggers.get(tag);
    if (cached) return cached;

    const shouldLog = (messageLevel: LogLevel): boolean => {
      if (this.disabledTags.has(tag)) return false;
      const effectiveLevel = this.tagLevels.get(tag) ?? defaultLogLevel;
      return LEVEL_VALUES[messageLevel] >= LEVEL_VALUES[effectiveLevel];
    };

    let extendedLogger = rnLoggerInstance.extend(tag);

    const subLogger: SubLogger = {
      debug: (message: string) => {
        if (shouldLog("debug")) extendedLogger.debug(message);
      },
      info: (message: string) => {
        if (shouldLog("info")) extendedLogger.info(message);
      },
      warn: (message: string) => {
        if (shouldLog("warn")) extendedLogger.warn(message);
      },
      error: (message: string, error?: Error) => {
        if (!shouldLog("error")) return;
        if (error) {
          extendedLogger.error(message, error);
        } else {
          extendedLogger.error(message);
        }
      },
      _refreshExtendedLogger: () => {
        extendedLogger = rnLoggerInstance.extend(tag);
      },
    };
    this.subLoggers.set(tag, subLogger);
    return subLogger;
  }

  debug(tag: string, message: string): void {
    this.forTag(tag).debug(message);
  }

  info(tag: string, message: string): void {
    this.forTag(tag).info(message);
  }

  warn(tag: string, message: string): void {
    this.forTag(tag).warn(message);
  }

  /**
   * @param tag - Component or module name
   * @param error - Optional Error object to include stack trace
   */
  error(tag: string, message: string, error?: Error): void {
    this.forTag(tag).error(message, error);
  }

  setEnabled(enabled: boolean): void {
    if (enabled) {
      rnLoggerInstance.enable();
    } else {
      rnLoggerInstance.disable();
    }
  }

  /**
   * Manually trigger log trimming and vacuum
   */
  manualTrim(): void {
    try {
      trimOldLogs(Date.now());
    } catch (error) {
      console.error("[Logger] Failed to manually trim logs:", error);
    }
  }

  getRetentionDurationMs(): number {
    return currentRetentionDurationMs;
  }

  /**
   * Update the log retention duration; values below one hour are clamped
   */
  setRetentionDurationMs(durationMs: number): void {
    const clampedDuration = clampRetentionDuration(durationMs);
    const hasChanged = clampedDuration !== currentRetentionDurationMs;
    currentRetentionDurationMs = clampedDuration;
    if (hasChanged) {
      this.manualTrim();
    }
  }

  enableTag(tag: string): void {
    this.disabledTags.delete(tag);
  }

  disableTag(tag: string): void {
    this.disabledTags.add(tag);
  }

  isTagEnabled(tag: string): boolean {
    return !this.disabledTags.has(tag);
  }

  /**
   * Set log level for a specific tag
   */
  setTagLevel(tag: string, level: LogLevel): void {
    this.tagLevels.set(tag, level);
    this.recreateLogger();
  }

  /**
   * Remove custom log level for a tag (revert to the default level)
   */
  clearTagLevel(tag: string): void {
    this.tagLevels.delete(tag);
    this.recreateLogger();
  }

  getTagLevel(tag: string): LogLevel | undefined {
    return this.tagLevels.get(tag);
  }

  getDefaultLogLevel(): LogLevel {
    return defaultLogLevel;
  }

  setDefaultLogLevel(level: LogLevel): void {
    defaultLogLevel = level;
    this.recreateLogger();
  }

  /**
   * Clear the sublogger cache (useful for testing)
   */
  clearCache(): void {
    this.subLoggers.clear();
  }

  // react-native-logs filters by its own severity before our per-tag check runs,
  // so it must be rebuilt whenever the most verbose configured level changes
  private recreateLogger(): void {
    rnLoggerInstance = rnLogger.createLogger(getConfig(this.tagLevels));
    for (const subLogger of this.subLoggers.values()) {
      subLogger._refreshExtendedLogger?.();
    }
  }
}

export const logger = Logger.getInstance();
