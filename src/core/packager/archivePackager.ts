import archiver from 'archiver';
import * as fs from 'fs-extra';
import * as path from 'path';
import logger from '../../utils/logger';
import { toArchiveEntryName } from '../shared/path-utils';

// 압축 옵션
export interface ArchiveOptions {
  compressionLevel?: number; // 0-9
}

// 압축 결과
export interface ArchiveResult {
  outputPath: string;
  /** 기록된 엔트리 이름 (기록 순서) */
  entries: string[];
  totalBytes: number;
}

/**
 * 디렉토리 아래의 모든 일반 파일을 정렬된 순서로 수집
 */
async function collectFiles(dir: string): Promise<string[]> {
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const dirent of dirents) {
    const fullPath = path.join(dir, dirent.name);
    if (dirent.isDirectory()) {
      files.push(...(await collectFiles(fullPath)));
    } else if (dirent.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

export class ArchivePackager {
  /**
   * 디렉토리를 ZIP(deflate)으로 묶습니다.
   * 엔트리 이름은 rootDir 기준 상대 경로이며 원본 디렉토리는 그대로 둡니다.
   */
  async packDirectory(
    sourceDir: string,
    rootDir: string,
    outputPath: string,
    options: ArchiveOptions = {}
  ): Promise<ArchiveResult> {
    const { compressionLevel = 6 } = options;

    const files = await collectFiles(sourceDir);
    const entries = files.map((file) => ({
      file,
      name: toArchiveEntryName(file, rootDir),
    }));

    await fs.ensureDir(path.dirname(outputPath));

    let totalBytes = 0;
    for (const { file } of entries) {
      const stat = await fs.stat(file);
      totalBytes += stat.size;
    }

    await this.createZip(entries, outputPath, compressionLevel);

    logger.info('분할 APK 압축 완료', {
      outputPath,
      fileCount: entries.length,
      totalBytes,
    });

    return {
      outputPath,
      entries: entries.map((entry) => entry.name),
      totalBytes,
    };
  }

  /**
   * ZIP 압축 파일 생성
   * .partial 파일에 기록한 뒤 완료되면 outputPath로 이동합니다.
   * 실패하면 outputPath에는 아무것도 남지 않습니다.
   */
  private async createZip(
    entries: { file: string; name: string }[],
    outputPath: string,
    compressionLevel: number
  ): Promise<void> {
    const partialPath = `${outputPath}.partial`;
    try {
      await this.writeZip(entries, partialPath, compressionLevel);
      await fs.move(partialPath, outputPath, { overwrite: true });
    } catch (error) {
      await fs.remove(partialPath);
      throw error;
    }
  }

  /**
   * ZIP 표준에서는 경로 구분자로 forward slash(/)만 허용
   */
  private writeZip(
    entries: { file: string; name: string }[],
    outputPath: string,
    compressionLevel: number
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      const output = fs.createWriteStream(outputPath);
      const archive = archiver('zip', {
        zlib: { level: compressionLevel },
      });

      output.on('close', () => resolve());
      output.on('error', (err) => {
        archive.abort();
        reject(err);
      });
      archive.on('error', (err) => reject(err));

      archive.pipe(output);
      for (const entry of entries) {
        archive.file(entry.file, { name: entry.name });
      }
      archive.finalize().catch(reject);
    });
  }
}

// 싱글톤 인스턴스
let archivePackagerInstance: ArchivePackager | null = null;

export function getArchivePackager(): ArchivePackager {
  if (!archivePackagerInstance) {
    archivePackagerInstance = new ArchivePackager();
  }
  return archivePackagerInstance;
}
