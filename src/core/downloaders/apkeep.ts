import * as path from 'path';
import { performance } from 'perf_hooks';
import type {
  AppConfig,
  AppInfo,
  ApkDownloadResult,
  ArtifactLocation,
  ArtifactPaths,
  IProcessRunner,
  ProcessResult,
} from '../../types';
import logger from '../../utils/logger';
import { getConfigManager } from '../config';
import { APKEEP_EMAIL_ENV, APKEEP_TOKEN_ENV } from '../credentials';
import { DownloadError } from '../errors';
import { ArchivePackager, getArchivePackager } from '../packager/archivePackager';
import { getArtifactPaths, resolveArtifactLocation } from '../shared/artifact-location';
import { isSafePathSegment } from '../shared/path-utils';
import { getProcessRunner } from '../shared/process-runner';
import { ApkDownloader } from './apk-downloader';

export const APKEEP_COMMAND = 'apkeep';
export const GOOGLE_PLAY_SOURCE = 'google-play';

// stderr가 비어 있을 때 사용
export const NO_DETAILS_PLACEHOLDER = '상세 정보 없음';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * apkeep CLI 기반 Google Play 다운로더
 *
 * apkeep의 Google Play 소스는 버전 지정을 지원하지 않습니다
 * (@version 문법은 APKPure, F-Droid 소스에서만 동작). 특정 버전 요청은
 * 경고를 남기고 최신 버전으로 대체됩니다.
 */
export class ApkeepDownloader extends ApkDownloader {
  readonly source = 'apkeep' as const;
  protected readonly origin = GOOGLE_PLAY_SOURCE;

  constructor(
    config: AppConfig,
    private readonly runner: IProcessRunner = getProcessRunner(),
    private readonly packager: ArchivePackager = getArchivePackager()
  ) {
    super(config);
  }

  /**
   * 최신 버전 다운로드
   */
  async latestVersion(app: AppInfo): Promise<ApkDownloadResult> {
    const fileName = await this.runApkeep(app.packageName);
    return { fileName, sourceUri: this.buildSourceUri(app.packageName) };
  }

  /**
   * 특정 버전 다운로드
   * 버전 고정이 불가능하므로 최신 버전을 받고, 출처 URI에도 버전을 넣지 않습니다.
   */
  async specificVersion(app: AppInfo, version: string): Promise<ApkDownloadResult> {
    logger.warn(
      `apkeep(Google Play)은 특정 버전 다운로드를 지원하지 않습니다. ` +
        `${app.packageName}@${version} 요청을 최신 버전으로 대체합니다`,
      { packageName: app.packageName, requestedVersion: version }
    );
    const fileName = await this.runApkeep(app.packageName);
    return { fileName, sourceUri: this.buildSourceUri(app.packageName) };
  }

  /**
   * apkeep 실행 후 산출물 파일명을 반환합니다.
   * 이미 임시 폴더에 산출물이 있으면 apkeep을 실행하지 않습니다.
   */
  private async runApkeep(packageName: string): Promise<string> {
    const email = this.config.env.getValue(APKEEP_EMAIL_ENV);
    const token = this.config.env.getValue(APKEEP_TOKEN_ENV);

    if (!email || !token) {
      throw new DownloadError(`${APKEEP_EMAIL_ENV}와 ${APKEEP_TOKEN_ENV} 환경 변수가 설정되어야 합니다`);
    }
    if (!isSafePathSegment(packageName)) {
      throw new DownloadError(`유효하지 않은 패키지명입니다: ${JSON.stringify(packageName)}`);
    }

    const paths = getArtifactPaths(this.config.tempFolder, packageName);

    const existing = await this.locate(packageName, paths);
    if (existing.kind === 'single-file' || existing.kind === 'archive') {
      logger.debug('기존 산출물 사용', { packageName, path: existing.path });
      return existing.fileName;
    }

    const args = [
      '-a',
      packageName,
      '-d',
      GOOGLE_PLAY_SOURCE,
      '-e',
      email,
      '-t',
      token,
      '-o',
      'split_apk=true',
      // cwd가 tempFolder의 상위 폴더이므로 마지막 구성요소만 전달
      path.basename(this.config.tempFolder),
    ];

    const start = performance.now();
    const result = await this.execute(packageName, args);
    this.assertSucceeded(packageName, result);
    logger.info(
      `apkeep 완료: ${packageName} (${((performance.now() - start) / 1000).toFixed(2)}초)`
    );

    const produced = await this.locate(packageName, paths);
    switch (produced.kind) {
      case 'single-file':
      case 'archive':
        return produced.fileName;
      case 'directory': {
        await this.pack(packageName, produced.path, paths.zipPath);
        return path.basename(paths.zipPath);
      }
      case 'missing':
        throw new DownloadError(
          `apkeep 실행 후 APK를 찾을 수 없습니다. 예상 경로: ${paths.filePath} 또는 ${paths.folderPath}`
        );
    }
  }

  private async locate(packageName: string, paths: ArtifactPaths): Promise<ArtifactLocation> {
    try {
      return await resolveArtifactLocation(paths);
    } catch (error) {
      throw new DownloadError(
        `산출물 확인 실패 (${packageName}): ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private async pack(packageName: string, folderPath: string, zipPath: string): Promise<void> {
    try {
      await this.packager.packDirectory(folderPath, this.config.tempFolder, zipPath);
    } catch (error) {
      throw new DownloadError(
        `분할 APK 압축 실패 (${packageName}): ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * 출력 디렉토리 인자가 tempFolder로 해석되도록 상위 폴더에서 실행
   */
  private async execute(packageName: string, args: string[]): Promise<ProcessResult> {
    try {
      return await this.runner.run(APKEEP_COMMAND, args, {
        cwd: path.dirname(this.config.tempFolder),
        timeoutMs: this.config.fetchTimeoutMs,
      });
    } catch (error) {
      throw new DownloadError(`apkeep 실행 실패 (${packageName}): ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private assertSucceeded(packageName: string, result: ProcessResult): void {
    if (result.timedOut) {
      throw new DownloadError(
        `apkeep 실행 시간 초과 (${this.config.fetchTimeoutMs}ms): ${packageName}`
      );
    }
    if (result.exitCode === 0) return;

    const errOutput = result.stderr.toString('utf8').trim() || NO_DETAILS_PLACEHOLDER;
    const exitStatus = result.exitCode ?? result.signal ?? 'unknown';
    throw new DownloadError(
      `apkeep 실패 (종료 코드 ${exitStatus}) - ${packageName}: ${errOutput}`
    );
  }
}

// 싱글톤 인스턴스
let apkeepDownloaderInstance: ApkeepDownloader | null = null;

export function getApkeepDownloader(): ApkeepDownloader {
  if (!apkeepDownloaderInstance) {
    apkeepDownloaderInstance = new ApkeepDownloader(getConfigManager().getAppConfig());
  }
  return apkeepDownloaderInstance;
}
