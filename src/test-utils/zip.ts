/**
 * ZIP 검증용 테스트 유틸리티
 * 중앙 디렉토리를 읽어 엔트리 이름과 압축 방식을 반환합니다.
 */

import * as fs from 'fs-extra';

export interface ZipEntryInfo {
  name: string;
  /** 0: stored, 8: deflate */
  method: number;
}

const EOCD_SIGNATURE = Buffer.from([0x50, 0x4b, 0x05, 0x06]);
const CENTRAL_HEADER_SIZE = 46;

export async function readZipEntries(zipPath: string): Promise<ZipEntryInfo[]> {
  const buf = await fs.readFile(zipPath);
  const eocd = buf.lastIndexOf(EOCD_SIGNATURE);
  if (eocd < 0) {
    throw new Error(`ZIP 종료 레코드를 찾을 수 없습니다: ${zipPath}`);
  }

  const count = buf.readUInt16LE(eocd + 10);
  let offset = buf.readUInt32LE(eocd + 16);
  const entries: ZipEntryInfo[] = [];

  for (let i = 0; i < count; i++) {
    const method = buf.readUInt16LE(offset + 10);
    const nameLength = buf.readUInt16LE(offset + 28);
    const extraLength = buf.readUInt16LE(offset + 30);
    const commentLength = buf.readUInt16LE(offset + 32);
    const nameStart = offset + CENTRAL_HEADER_SIZE;
    entries.push({
      name: buf.toString('utf8', nameStart, nameStart + nameLength),
      method,
    });
    offset = nameStart + nameLength + extraLength + commentLength;
  }

  return entries;
}
