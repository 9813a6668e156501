import chalk from 'chalk';
import Table from 'cli-table3';
import { Config, getConfigManager } from '../../core/config';

// 설정 설명
const DESCRIPTIONS: Record<keyof Config, string> = {
  tempFolderName: 'apkeep 출력 폴더',
  logLevel: '로그 레벨',
  fetchTimeoutMs: 'apkeep 제한 시간 (ms, 0=없음)',
};

/**
 * 문자열 입력을 숫자, 불리언, 문자열로 파싱
 */
export function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    const entry = Object.entries(config).find(([name]) => name === key);
    if (entry) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(entry[1])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    const parsedValue = parseConfigValue(value);
    getConfigManager().set(key, parsedValue);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const config = getConfigManager().getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [20, 25, 32],
  });

  table.push(
    ['tempFolderName', config.tempFolderName, DESCRIPTIONS.tempFolderName],
    ['logLevel', config.logLevel, DESCRIPTIONS.logLevel],
    ['fetchTimeoutMs', String(config.fetchTimeoutMs), DESCRIPTIONS.fetchTimeoutMs]
  );

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
