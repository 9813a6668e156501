import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { buildAppConfig, downloadCommand } from './download';
import { parseConfigValue } from './config';
import { ConfigManager } from '../../core/config';
import { EnvCredentialProvider } from '../../core/credentials';
import { FakeProcessRunner } from '../../test-utils/fake-process-runner';
import logger from '../../utils/logger';

vi.mock('../../utils/logger', () => ({
  default: {
    initialize: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
    logError: vi.fn(),
  },
}));

const PACKAGE = 'com.example.app';

describe('cli download', () => {
  let configDir: string;
  let workDir: string;
  let configManager: ConfigManager;
  let runner: FakeProcessRunner;
  const env = new EnvCredentialProvider({ APKEEP_EMAIL: 'user@example.com', APKEEP_TOKEN: 'test-token' });

  beforeEach(async () => {
    vi.clearAllMocks();
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'apkfetch-cli-config-'));
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'apkfetch-cli-work-'));
    configManager = new ConfigManager(configDir);
    runner = new FakeProcessRunner();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(configDir);
    await fs.remove(workDir);
  });

  describe('buildAppConfig', () => {
    it('--temp-dir가 없으면 설정 파일의 tempFolderName 사용', () => {
      const appConfig = buildAppConfig({ appVersion: 'latest' }, '/work', configManager, env);

      expect(appConfig.tempFolder).toBe(path.resolve('/work', 'apks'));
      expect(appConfig.env).toBe(env);
    });

    it('여러 단계의 tempFolderName도 작업 디렉토리 기준으로 해석', () => {
      configManager.set('tempFolderName', 'out/apks');

      const appConfig = buildAppConfig({ appVersion: 'latest' }, '/work', configManager, env);

      expect(appConfig.tempFolder).toBe(path.resolve('/work', 'out/apks'));
    });

    it('--temp-dir 지정 시 임시 폴더 변경', () => {
      const appConfig = buildAppConfig(
        { appVersion: 'latest', tempDir: 'out/apks' },
        '/work',
        configManager,
        env
      );

      expect(appConfig.tempFolder).toBe(path.resolve('/work', 'out/apks'));
    });
  });

  describe('downloadCommand', () => {
    // apkeep처럼 cwd 기준으로 마지막 인자를 출력 디렉토리로 사용
    const writeApkLikeApkeep = () => {
      runner.respondWith(async (run) => {
        const cwd = run.options?.cwd ?? process.cwd();
        const outputDir = path.resolve(cwd, run.args[run.args.length - 1]);
        if (!(await fs.pathExists(outputDir))) {
          return { exitCode: 1, stderr: Buffer.from('output directory missing') };
        }
        await fs.writeFile(path.join(outputDir, `${PACKAGE}.apk`), 'apk');
        return {};
      });
    };

    it('설정 디렉토리의 로그 경로와 레벨로 로거 초기화', async () => {
      configManager.set('logLevel', 'debug');
      writeApkLikeApkeep();

      await downloadCommand(PACKAGE, { appVersion: 'latest' }, { configManager, workDir, env, runner });

      expect(logger.initialize).toHaveBeenCalledWith({
        logsDir: path.join(configDir, 'logs'),
        level: 'debug',
      });
    });

    it('존재하지 않는 임시 폴더를 생성한 뒤 다운로드', async () => {
      writeApkLikeApkeep();

      await downloadCommand(
        PACKAGE,
        { appVersion: 'latest', tempDir: 'out/apks' },
        { configManager, workDir, env, runner }
      );

      expect(runner.calls).toHaveLength(1);
      expect(runner.calls[0].options?.cwd).toBe(path.join(workDir, 'out'));
      expect(await fs.pathExists(path.join(workDir, 'out', 'apks', `${PACKAGE}.apk`))).toBe(true);
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('--temp-dir가 없으면 작업 디렉토리의 apks 폴더 사용', async () => {
      writeApkLikeApkeep();

      await downloadCommand(PACKAGE, { appVersion: 'latest' }, { configManager, workDir, env, runner });

      expect(runner.calls[0].options?.cwd).toBe(workDir);
      expect(await fs.pathExists(path.join(workDir, 'apks', `${PACKAGE}.apk`))).toBe(true);
    });

    it('버전을 지정하면 경고 후 최신 버전 다운로드', async () => {
      writeApkLikeApkeep();

      await downloadCommand(PACKAGE, { appVersion: '3.2.1' }, { configManager, workDir, env, runner });

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(await fs.pathExists(path.join(workDir, 'apks', `${PACKAGE}.apk`))).toBe(true);
    });

    it('DownloadError는 로그를 남기고 종료 코드 1로 종료', async () => {
      const noCredentials = new EnvCredentialProvider({});

      await expect(
        downloadCommand(PACKAGE, { appVersion: 'latest' }, { configManager, workDir, env: noCredentials, runner })
      ).rejects.toThrow('exit 1');

      expect(runner.calls).toHaveLength(0);
      expect(logger.error).toHaveBeenCalledWith(
        '다운로드 실패: APKEEP_EMAIL와 APKEEP_TOKEN 환경 변수가 설정되어야 합니다',
        { packageName: PACKAGE }
      );
      expect(logger.logError).not.toHaveBeenCalled();
    });

    it('그 밖의 오류는 스택과 함께 기록하고 종료 코드 1로 종료', async () => {
      // 임시 폴더 경로 중간에 일반 파일이 있어 생성할 수 없음
      await fs.writeFile(path.join(workDir, 'blocker'), 'file');

      await expect(
        downloadCommand(
          PACKAGE,
          { appVersion: 'latest', tempDir: 'blocker/apks' },
          { configManager, workDir, env, runner }
        )
      ).rejects.toThrow('exit 1');

      expect(runner.calls).toHaveLength(0);
      expect(logger.logError).toHaveBeenCalledTimes(1);
      expect(vi.mocked(logger.logError).mock.calls[0][1]).toBe('다운로드 중 예기치 않은 오류');
    });
  });
});

describe('cli config', () => {
  describe('parseConfigValue', () => {
    it('숫자, 불리언, 문자열 파싱', () => {
      expect(parseConfigValue('3000')).toBe(3000);
      expect(parseConfigValue('true')).toBe(true);
      expect(parseConfigValue('false')).toBe(false);
      expect(parseConfigValue('debug')).toBe('debug');
    });

    it('빈 문자열은 숫자로 바꾸지 않음', () => {
      expect(parseConfigValue('')).toBe('');
    });
  });
});
