// Core module exports for apkfetch

// Downloaders
export { ApkDownloader } from './downloaders/apk-downloader';
export {
  ApkeepDownloader,
  getApkeepDownloader,
  APKEEP_COMMAND,
  GOOGLE_PLAY_SOURCE,
} from './downloaders/apkeep';

// Packager
export { ArchivePackager, getArchivePackager } from './packager/archivePackager';
export type { ArchiveOptions, ArchiveResult } from './packager/archivePackager';

// Errors
export { DownloadError, isDownloadError } from './errors';

// Credentials
export { EnvCredentialProvider, APKEEP_EMAIL_ENV, APKEEP_TOKEN_ENV } from './credentials';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { Config } from './config';

// Shared utilities
export { getArtifactPaths, resolveArtifactLocation } from './shared/artifact-location';
export { SpawnProcessRunner, getProcessRunner } from './shared/process-runner';
export { toUnixPath, toArchiveEntryName, isSafePathSegment } from './shared/path-utils';

export type * from '../types';
