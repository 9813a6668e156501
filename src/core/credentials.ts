import { ICredentialProvider } from '../types';

// apkeep Google Play 계정 환경 변수
export const APKEEP_EMAIL_ENV = 'APKEEP_EMAIL';
export const APKEEP_TOKEN_ENV = 'APKEEP_TOKEN';

/**
 * 프로세스 환경 변수에서 자격 증명을 읽습니다.
 */
export class EnvCredentialProvider implements ICredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getValue(name: string): string {
    return this.env[name] ?? '';
  }
}
