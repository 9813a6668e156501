/**
 * APK 다운로드 실패
 * 자격 증명 누락, 외부 도구 실패, 산출물 누락을 모두 이 타입으로 알립니다.
 */
export class DownloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DownloadError';
  }
}

export function isDownloadError(value: unknown): value is DownloadError {
  return value instanceof DownloadError;
}
