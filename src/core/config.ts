import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as winston from 'winston';
import { AppConfig, ICredentialProvider } from '../types';
import { EnvCredentialProvider } from './credentials';

// 설정 인터페이스 정의
export interface Config {
  // 외부 도구 출력 디렉토리 (작업 디렉토리 기준)
  tempFolderName: string;
  // winston npm 레벨 이름 (error, warn, info, http, verbose, debug, silly)
  logLevel: string;
  // apkeep 실행 제한 시간 (0이면 제한 없음)
  fetchTimeoutMs: number;
}

// 기본 설정값
export const DEFAULT_CONFIG: Config = {
  tempFolderName: 'apks',
  logLevel: 'info',
  fetchTimeoutMs: 0,
};

const CONFIG_KEYS = Object.keys(DEFAULT_CONFIG);
export const LOG_LEVELS = Object.keys(winston.config.npm.levels);

function isConfigKey(key: string): key is keyof Config {
  return CONFIG_KEYS.includes(key);
}

/**
 * 파일에서 읽은 값과 기본값을 병합합니다. 타입이 맞지 않는 값은 무시합니다.
 */
function mergeWithDefaults(raw: unknown): Config {
  const config: Config = { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || raw === null) {
    return config;
  }

  const entries = Object.entries(raw);
  for (const [key, value] of entries) {
    if (key === 'tempFolderName' && typeof value === 'string' && value.trim()) {
      config.tempFolderName = value.trim();
    } else if (key === 'logLevel' && typeof value === 'string' && LOG_LEVELS.includes(value)) {
      config.logLevel = value;
    } else if (key === 'fetchTimeoutMs' && typeof value === 'number' && value >= 0) {
      config.fetchTimeoutMs = value;
    }
  }
  return config;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = path.join(os.homedir(), '.apkfetch')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 생성합니다.
   */
  async loadConfig(): Promise<Config> {
    await this.ensureDirectories();

    if (await fs.pathExists(this.configPath)) {
      const rawConfig: unknown = await fs.readJson(this.configPath);
      return mergeWithDefaults(rawConfig);
    }

    await this.saveConfig(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: Config): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용).
   */
  getConfig(): Config {
    if (!fs.pathExistsSync(this.configPath)) {
      return { ...DEFAULT_CONFIG };
    }
    const rawConfig: unknown = fs.readJsonSync(this.configPath);
    return mergeWithDefaults(rawConfig);
  }

  /**
   * 다운로더용 애플리케이션 설정을 생성합니다.
   * 임시 폴더는 workDir 기준으로 해석됩니다.
   */
  getAppConfig(
    workDir: string = process.cwd(),
    env: ICredentialProvider = new EnvCredentialProvider()
  ): AppConfig {
    const config = this.getConfig();
    return {
      tempFolder: path.resolve(workDir, config.tempFolderName),
      fetchTimeoutMs: config.fetchTimeoutMs,
      env,
    };
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: string, value: unknown): Config {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키입니다: ${key}`);
    }
    const next = mergeWithDefaults({ ...this.getConfig(), [key]: value });
    if (next[key] !== value) {
      throw new Error(`유효하지 않은 설정값입니다: ${key} = ${JSON.stringify(value)}`);
    }

    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, next, { spaces: 2 });
    return next;
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
