// ============================================
// 앱 / 다운로드 결과 타입
// ============================================

/** 다운로드 대상 앱 */
export interface AppInfo {
  /** 패키지명 (예: com.example.app) */
  packageName: string;
}

/** APK 다운로드 결과 */
export interface ApkDownloadResult {
  /** 임시 폴더 기준 산출물 파일명 (.apk 또는 .zip) */
  fileName: string;
  /** 출처 식별자 (<scheme>://<source>/<package>) */
  sourceUri: string;
}

/** 지원하는 다운로드 소스 */
export type ApkSource = 'apkeep';

// ============================================
// 산출물 위치 타입
// ============================================

/** 패키지명에서 유도되는 후보 경로 */
export interface ArtifactPaths {
  /** 단일 APK 파일 경로 */
  filePath: string;
  /** 분할 APK 디렉토리 경로 */
  folderPath: string;
  /** 분할 APK를 묶은 ZIP 경로 */
  zipPath: string;
}

/** 파일시스템에서 확인한 산출물 상태 */
export type ArtifactLocation =
  | { kind: 'single-file'; path: string; fileName: string }
  | { kind: 'archive'; path: string; fileName: string }
  | { kind: 'directory'; path: string }
  | { kind: 'missing' };

// ============================================
// 외부 의존성 인터페이스
// ============================================

/** 이름으로 자격 증명 값을 조회 (없으면 빈 문자열) */
export interface ICredentialProvider {
  getValue(name: string): string;
}

/** 프로세스 실행 옵션 */
export interface ProcessRunOptions {
  /** 작업 디렉토리 */
  cwd?: string;
  /** 0 또는 미지정이면 무제한 대기 */
  timeoutMs?: number;
}

/** 프로세스 실행 결과 */
export interface ProcessResult {
  /** 시그널로 종료된 경우 null */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
  timedOut: boolean;
}

/** 외부 명령 실행기 */
export interface IProcessRunner {
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

// ============================================
// 설정 / 다운로더 인터페이스
// ============================================

/** 다운로더에 전달되는 애플리케이션 설정 */
export interface AppConfig {
  /** 임시 폴더 절대 경로 (외부 도구에는 마지막 구성요소가 전달됨) */
  tempFolder: string;
  /** 외부 도구 실행 제한 시간 (0이면 제한 없음) */
  fetchTimeoutMs: number;
  /** 환경 변수 조회 */
  env: ICredentialProvider;
}

/** APK 다운로더 인터페이스 */
export interface IApkDownloader {
  /** 다운로드 소스 */
  readonly source: ApkSource;

  /** 최신 버전 다운로드 */
  latestVersion(app: AppInfo): Promise<ApkDownloadResult>;

  /** 특정 버전 다운로드 */
  specificVersion(app: AppInfo, version: string): Promise<ApkDownloadResult>;
}
