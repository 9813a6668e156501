/**
 * 경로 처리 유틸리티
 */

import * as path from 'path';

/**
 * 경로를 Unix 스타일(슬래시)로 변환
 * ZIP 아카이브 내부 경로에 사용
 */
export function toUnixPath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * baseDir 기준 상대 경로를 ZIP 엔트리 이름으로 반환
 * baseDir 밖의 경로는 허용하지 않습니다.
 */
export function toArchiveEntryName(fullPath: string, baseDir: string): string {
  const relative = path.relative(baseDir, fullPath);
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  if (!relative || escapes || path.isAbsolute(relative)) {
    throw new Error(`기준 디렉토리 밖의 경로입니다: ${fullPath} (기준: ${baseDir})`);
  }
  return toUnixPath(relative);
}

/**
 * 패키지명이 단일 경로 구성요소인지 확인
 * 구분자나 상대 경로 표기가 포함되면 임시 폴더를 벗어날 수 있음
 */
export function isSafePathSegment(name: string): boolean {
  if (!name || name === '.' || name === '..') return false;
  return !/[\\/]/.test(name) && !name.includes('\0');
}
