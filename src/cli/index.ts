#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('apkfetch')
  .description(chalk.cyan('apkfetch - apkeep 기반 Google Play APK 다운로더'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// download 명령어
program
  .command('download')
  .description('APK 다운로드')
  .argument('<package>', '패키지명 (예: com.example.app)')
  .option('-V, --app-version <version>', '앱 버전', 'latest')
  .option('-d, --temp-dir <dir>', '임시 폴더 (현재 디렉토리 기준)')
  .action(async (packageName: string, options: { appVersion: string; tempDir?: string }) => {
    const { downloadCommand } = await import('./commands/download');
    await downloadCommand(packageName, options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  apkfetch - apkeep 기반 Google Play APK 다운로더\n'));
  console.log('  사용법: apkfetch <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    download    APK 다운로드');
  console.log('    config      설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    apkfetch download com.example.app'));
  console.log(chalk.gray('    apkfetch download com.example.app -V 3.2.1'));
  console.log(chalk.gray('    apkfetch config set tempFolderName downloads'));
  console.log('\n  자세한 내용: apkfetch --help\n');
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
