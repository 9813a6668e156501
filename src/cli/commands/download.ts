import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ConfigManager, getConfigManager } from '../../core/config';
import { EnvCredentialProvider } from '../../core/credentials';
import { ApkeepDownloader } from '../../core/downloaders/apkeep';
import { isDownloadError } from '../../core/errors';
import { getProcessRunner } from '../../core/shared/process-runner';
import { ApkDownloadResult, AppConfig, ICredentialProvider, IProcessRunner } from '../../types';
import logger from '../../utils/logger';

// 다운로드 옵션
export interface DownloadOptions {
  appVersion: string;
  tempDir?: string;
}

// 테스트에서 교체 가능한 실행 환경
export interface DownloadDeps {
  configManager?: ConfigManager;
  workDir?: string;
  env?: ICredentialProvider;
  runner?: IProcessRunner;
}

/**
 * CLI 옵션을 반영한 애플리케이션 설정
 */
export function buildAppConfig(
  options: DownloadOptions,
  workDir: string = process.cwd(),
  configManager: ConfigManager = getConfigManager(),
  env: ICredentialProvider = new EnvCredentialProvider()
): AppConfig {
  const appConfig = configManager.getAppConfig(workDir, env);
  if (!options.tempDir) {
    return appConfig;
  }
  return { ...appConfig, tempFolder: path.resolve(workDir, options.tempDir) };
}

/**
 * download 명령어 핸들러
 */
export async function downloadCommand(
  packageName: string,
  options: DownloadOptions,
  deps: DownloadDeps = {}
): Promise<void> {
  const configManager = deps.configManager ?? getConfigManager();
  await logger.initialize({
    logsDir: configManager.getLogsDir(),
    level: configManager.getConfig().logLevel,
  });

  const appConfig = buildAppConfig(
    options,
    deps.workDir ?? process.cwd(),
    configManager,
    deps.env ?? new EnvCredentialProvider()
  );
  const downloader = new ApkeepDownloader(appConfig, deps.runner ?? getProcessRunner());

  console.log(chalk.cyan(`다운로드 준비 중: ${packageName}`));
  console.log(chalk.cyan(`임시 폴더: ${appConfig.tempFolder}\n`));

  try {
    // apkeep은 tempFolder의 상위 폴더에서 실행되므로 미리 생성
    await fs.ensureDir(appConfig.tempFolder);

    let result: ApkDownloadResult;
    if (options.appVersion === 'latest') {
      result = await downloader.latestVersion({ packageName });
    } else {
      console.log(chalk.yellow(`⚠ Google Play 소스는 버전 지정을 지원하지 않아 최신 버전을 받습니다 (요청: ${options.appVersion})`));
      result = await downloader.specificVersion({ packageName }, options.appVersion);
    }

    console.log(chalk.green('✓ 다운로드 완료!'));
    console.log(chalk.gray(`  파일: ${path.join(appConfig.tempFolder, result.fileName)}`));
    console.log(chalk.gray(`  출처: ${result.sourceUri}`));
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    if (isDownloadError(err)) {
      logger.error(`다운로드 실패: ${err.message}`, { packageName });
    } else {
      logger.logError(err, '다운로드 중 예기치 않은 오류');
    }
    console.log(chalk.red('✗ 다운로드 실패'));
    console.error(chalk.red(`오류: ${err.message}`));
    process.exit(1);
  }
}
