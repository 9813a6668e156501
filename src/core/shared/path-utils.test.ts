import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { toUnixPath, toArchiveEntryName, isSafePathSegment } from './path-utils';

describe('path-utils', () => {
  describe('toUnixPath', () => {
    it('백슬래시를 슬래시로 변환', () => {
      expect(toUnixPath('com.example.app\\nested\\base.apk')).toBe('com.example.app/nested/base.apk');
    });
  });

  describe('toArchiveEntryName', () => {
    const base = path.join(path.sep, 'work', 'apks');

    it('기준 디렉토리 상대 경로 반환', () => {
      const full = path.join(base, 'com.example.app', 'nested', 'base.apk');
      expect(toArchiveEntryName(full, base)).toBe('com.example.app/nested/base.apk');
    });

    it('기준 디렉토리 밖의 경로는 거부', () => {
      const outside = path.join(path.sep, 'work', 'other', 'base.apk');
      expect(() => toArchiveEntryName(outside, base)).toThrow('기준 디렉토리 밖의 경로입니다');
    });

    it('점 두 개로 시작하는 이름은 기준 디렉토리 안의 경로', () => {
      const full = path.join(base, '..evil', 'base.apk');
      expect(toArchiveEntryName(full, base)).toBe('..evil/base.apk');
    });

    it('기준 디렉토리의 상위 폴더는 거부', () => {
      expect(() => toArchiveEntryName(path.dirname(base), base)).toThrow('기준 디렉토리 밖의 경로입니다');
    });

    it('기준 디렉토리 자체는 거부', () => {
      expect(() => toArchiveEntryName(base, base)).toThrow('기준 디렉토리 밖의 경로입니다');
    });
  });

  describe('isSafePathSegment', () => {
    it('일반 패키지명 허용', () => {
      expect(isSafePathSegment('com.example.app')).toBe(true);
      expect(isSafePathSegment('..evil')).toBe(true);
    });

    it.each(['', '.', '..', 'a/b', 'a\\b', '../app'])('%j 거부', (name) => {
      expect(isSafePathSegment(name)).toBe(false);
    });
  });
});
