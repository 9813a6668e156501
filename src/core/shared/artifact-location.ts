import * as fs from 'fs-extra';
import * as path from 'path';
import { ArtifactLocation, ArtifactPaths } from '../../types';

/**
 * 패키지명에서 산출물 후보 경로 3종을 계산합니다.
 */
export function getArtifactPaths(tempFolder: string, packageName: string): ArtifactPaths {
  return {
    filePath: path.join(tempFolder, `${packageName}.apk`),
    folderPath: path.join(tempFolder, packageName),
    zipPath: path.join(tempFolder, `${packageName}.zip`),
  };
}

async function isDirectory(p: string): Promise<boolean> {
  if (!(await fs.pathExists(p))) return false;
  const stat = await fs.stat(p);
  return stat.isDirectory();
}

/**
 * 현재 파일시스템 상태로 산출물 위치를 판별합니다.
 * 우선순위: 단일 APK > ZIP > 분할 APK 디렉토리
 */
export async function resolveArtifactLocation(paths: ArtifactPaths): Promise<ArtifactLocation> {
  if (await fs.pathExists(paths.filePath)) {
    return { kind: 'single-file', path: paths.filePath, fileName: path.basename(paths.filePath) };
  }
  if (await fs.pathExists(paths.zipPath)) {
    return { kind: 'archive', path: paths.zipPath, fileName: path.basename(paths.zipPath) };
  }
  if (await isDirectory(paths.folderPath)) {
    return { kind: 'directory', path: paths.folderPath };
  }
  return { kind: 'missing' };
}
