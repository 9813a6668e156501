/**
 * 외부 프로세스 대신 사용하는 테스트용 실행기
 */

import type { IProcessRunner, ProcessResult, ProcessRunOptions } from '../types';

export interface RecordedRun {
  command: string;
  args: string[];
  options?: ProcessRunOptions;
}

type RunHandler = (run: RecordedRun) => Promise<Partial<ProcessResult>> | Partial<ProcessResult>;

export class FakeProcessRunner implements IProcessRunner {
  readonly calls: RecordedRun[] = [];

  constructor(private handler: RunHandler = () => ({})) {}

  /** 다음 실행부터 적용할 동작 */
  respondWith(handler: RunHandler): void {
    this.handler = handler;
  }

  async run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult> {
    const run: RecordedRun = { command, args, options };
    this.calls.push(run);
    const partial = await this.handler(run);
    return {
      exitCode: 0,
      signal: null,
      stdout: Buffer.alloc(0),
      stderr: Buffer.alloc(0),
      timedOut: false,
      ...partial,
    };
  }
}
