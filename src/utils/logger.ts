import * as fs from 'fs-extra';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';

// 개발 모드 여부
const isDev = process.env.NODE_ENV === 'development';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

export interface LoggerOptions {
  /** 로그 디렉토리 (기본: 설정 디렉토리의 logs) */
  logsDir?: string;
  /** 로그 레벨 (기본: 설정 파일의 logLevel) */
  level?: string;
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 초기화 전에는 콘솔에만 기록
    this.logger = winston.createLogger({
      level: 'info',
      format: logFormat,
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
        }),
      ],
    });
  }

  /**
   * 파일 로테이션 로거로 전환합니다.
   */
  async initialize(options: LoggerOptions = {}): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    const logsDir = options.logsDir ?? configManager.getLogsDir();
    const level = options.level ?? (isDev ? 'debug' : configManager.getConfig().logLevel);
    await fs.ensureDir(logsDir);

    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'apkfetch-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: logFormat,
    });

    // 에러 전용
    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: logFormat,
    });

    const transports: winston.transport[] = [fileTransport, errorFileTransport];

    if (isDev) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
        })
      );
    }

    this.logger = winston.createLogger({
      level,
      format: logFormat,
      transports,
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir, level });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다.
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
