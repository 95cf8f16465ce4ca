import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  OFF = 4
}

export class Logger {
  private logStream: fs.WriteStream | null = null;
  private debugLogStream: fs.WriteStream | null = null;
  private level: LogLevel;
  private enableConsole: boolean;

  constructor(logFile: string, level: LogLevel = LogLevel.INFO, enableConsole: boolean = false) {
    this.level = level;
    this.enableConsole = enableConsole;

    if (level === LogLevel.OFF) {
      return;
    }

    // Ensure the directory exists
    const logDir = path.dirname(logFile);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    this.logStream = fs.createWriteStream(logFile, { flags: 'a' });

    // Debug entries go to a companion file next to the main log
    const debugLogFile = logFile.replace(/\.log$/, '') + '-debug.log';
    this.debugLogStream = fs.createWriteStream(debugLogFile, { flags: 'a' });
  }

  public debug(message: string, data?: unknown): void {
    if (this.level <= LogLevel.DEBUG) {
      this.writeLog('DEBUG', message, data, this.debugLogStream);
    }
  }

  public info(message: string, data?: unknown): void {
    if (this.level <= LogLevel.INFO) {
      this.writeLog('INFO', message, data);
    }
  }

  public warn(message: string, data?: unknown): void {
    if (this.level <= LogLevel.WARN) {
      this.writeLog('WARN', message, data);
    }
  }

  public error(message: string, data?: unknown): void {
    if (this.level <= LogLevel.ERROR) {
      this.writeLog('ERROR', message, data);
    }
  }

  public log(message: string, data?: unknown): void {
    this.info(message, data);
  }

  private writeLog(level: string, message: string, data?: unknown, stream?: fs.WriteStream | null): void {
    const timestamp = new Date().toISOString();
    const logString = JSON.stringify({ timestamp, level, message, data }) + '\n';

    (stream ?? this.logStream)?.write(logString);

    // Every level also lands in the debug log
    if (!stream) {
      this.debugLogStream?.write(logString);
    }

    // stdout carries CLI output and the MCP stdio transport
    if (this.enableConsole) {
      const consoleData = data !== undefined ? ` ${JSON.stringify(data)}` : '';
      console.error(`[${timestamp}] [${level}] ${message}${consoleData}`);
    }
  }

  public close(): void {
    this.logStream?.end();
    this.debugLogStream?.end();
  }
}

// Logging configuration via environment variables
// LOGLEVEL: OFF | ERROR | WARN | INFO | DEBUG (default: OFF)
// LOGFILE: path to log file (default: logs/hdr-curves.log)
// LOGCONSOLE: 'true' to echo entries on stderr

export function logLevelFromString(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'OFF': default: return LogLevel.OFF;
  }
}

const LOGFILE = process.env.LOGFILE || path.resolve(process.cwd(), 'logs', 'hdr-curves.log');

export const logger = new Logger(
  LOGFILE,
  logLevelFromString(process.env.LOGLEVEL || 'OFF'),
  process.env.LOGCONSOLE === 'true'
);

// Handle process exit to ensure logs are flushed
process.on('exit', () => {
  logger.close();
});
