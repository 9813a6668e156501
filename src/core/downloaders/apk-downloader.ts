/**
 * APK 다운로더 기본 클래스
 * 소스별 구현은 최신 버전 / 특정 버전 다운로드 두 가지를 제공합니다.
 */

import type { AppConfig, AppInfo, ApkDownloadResult, ApkSource, IApkDownloader } from '../../types';

export abstract class ApkDownloader implements IApkDownloader {
  abstract readonly source: ApkSource;

  /** 출처 URI의 소스 구간 (예: google-play) */
  protected abstract readonly origin: string;

  constructor(protected readonly config: AppConfig) {}

  abstract latestVersion(app: AppInfo): Promise<ApkDownloadResult>;

  abstract specificVersion(app: AppInfo, version: string): Promise<ApkDownloadResult>;

  /**
   * 출처 URI 생성 (<scheme>://<origin>/<package>)
   * 버전 정보는 포함하지 않습니다.
   */
  protected buildSourceUri(packageName: string): string {
    return `${this.source}://${this.origin}/${packageName}`;
  }
}
