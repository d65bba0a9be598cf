import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { chalkStderr as chalk } from "chalk";

// Define log levels
export type LogLevel = "debug" | "info" | "warn" | "error";

// Interface for logger configuration
export interface LoggerConfig {
  logToConsole: boolean; // Console output always goes to stderr
  logToFile: boolean;
  logFilePath?: string;
  consoleLogLevel: LogLevel; // Separate level for console
  fileLogLevel: LogLevel; // Separate level for file
}

// Default configuration
const defaultConfig: LoggerConfig = {
  logToConsole: true,
  logToFile: false,
  consoleLogLevel: "info",
  fileLogLevel: "debug",
};

// Current configuration
let currentConfig: LoggerConfig = { ...defaultConfig };

/**
 * Configure the logger
 * @param config Configuration options, merged over the current ones
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  currentConfig = { ...currentConfig, ...config };

  // Create log directory if logging to file
  if (currentConfig.logToFile && currentConfig.logFilePath) {
    const logDir = dirname(currentConfig.logFilePath);
    if (logDir && !existsSync(logDir)) {
      try {
        mkdirSync(logDir, { recursive: true });
      } catch (error) {
        console.error(`Failed to create log directory: ${error}`);
        currentConfig.logToFile = false;
      }
    }
  }
}

/** Restores the default configuration. */
export function resetLogger(): void {
  currentConfig = { ...defaultConfig };
}

/**
 * Numeric value for log level (for filtering)
 */
const logLevelValue: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Checks if a level should be logged to a specific target (console or file). */
function shouldLog(level: LogLevel, target: "console" | "file"): boolean {
  const threshold =
    target === "console"
      ? currentConfig.consoleLogLevel
      : currentConfig.fileLogLevel;
  return logLevelValue[level] >= logLevelValue[threshold];
}

/** True if a message at this level would reach the console. */
export function isConsoleLevelEnabled(level: LogLevel): boolean {
  return currentConfig.logToConsole && shouldLog(level, "console");
}

/**
 * Format a log message with timestamp and level
 */
export function formatLogMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

/**
 * Console output. stdout may be carrying the exported JSON, so every level
 * is written to stderr.
 */
function logToConsole(level: LogLevel, coloredMessage: string): void {
  if (!currentConfig.logToConsole || !shouldLog(level, "console")) return;
  console.error(coloredMessage);
}

/** Append to the log file if configured AND level meets file threshold. */
function logToFile(
  level: LogLevel,
  formattedMessage: string,
  context?: string
): void {
  if (
    !currentConfig.logToFile ||
    !currentConfig.logFilePath ||
    !shouldLog(level, "file")
  )
    return;

  let messageToWrite = formattedMessage;
  // Always include full context (like stack trace) in file log if present
  if (context) {
    messageToWrite += `\n  Context: ${context}`;
  }

  try {
    appendFileSync(currentConfig.logFilePath, messageToWrite + "\n");
  } catch (error) {
    console.error(`[Logger Error] Failed to write to log file: ${error}`);
  }
}

function log(
  level: LogLevel,
  colorize: (text: string) => string,
  message: string,
  context?: string
): void {
  if (!shouldLog(level, "console") && !shouldLog(level, "file")) return;
  const formattedMessage = formatLogMessage(level, message);
  logToConsole(level, colorize(formattedMessage));
  logToFile(level, formattedMessage, context);
}

/**
 * Log a debug message
 */
export function debug(message: string, context?: string): void {
  log("debug", chalk.gray, message, context);
}

/**
 * Log an info message
 */
export function info(message: string, context?: string): void {
  log("info", chalk.blue, message, context);
}

/**
 * Log a warning message
 */
export function warn(message: string, context?: string): void {
  log("warn", chalk.yellow, message, context);
}

/**
 * Log an error message
 */
export function error(message: string, context?: string): void {
  log("error", chalk.red, message, context);
}

/**
 * Log a success message (info level with green color)
 */
export function success(message: string, context?: string): void {
  log("info", chalk.green, message, context);
}
