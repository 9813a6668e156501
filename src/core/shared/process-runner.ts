import { spawn } from 'child_process';
import { IProcessRunner, ProcessResult, ProcessRunOptions } from '../../types';

/**
 * child_process.spawn 기반 실행기
 * 셸을 거치지 않으므로 인자에 특수문자가 있어도 그대로 전달됩니다.
 */
export class SpawnProcessRunner implements IProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (options.timeoutMs && options.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, options.timeoutMs);
      }

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      // 명령을 찾지 못한 경우 등
      child.on('error', (err) => {
        if (timer) clearTimeout(timer);
        reject(err);
      });

      child.on('close', (code, signal) => {
        if (timer) clearTimeout(timer);
        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
          timedOut,
        });
      });
    });
  }
}

// 싱글톤 인스턴스
let processRunnerInstance: SpawnProcessRunner | null = null;

export function getProcessRunner(): SpawnProcessRunner {
  if (!processRunnerInstance) {
    processRunnerInstance = new SpawnProcessRunner();
  }
  return processRunnerInstance;
}
