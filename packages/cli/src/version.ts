import { execFileSync } from 'child_process';

import packageInfo from '../package.json';

export interface VersionInfo {
  version: string;
  commit: string;
}

const COMMIT_ENV = 'LOGSWEEP_COMMIT';

export const readCommitHash = (env: NodeJS.ProcessEnv = process.env): string => {
  const pinned = env[COMMIT_ENV]?.trim();
  if (pinned) {
    return pinned;
  }

  try {
    const hash = execFileSync('git', ['rev-parse', '--short', 'HEAD'], {
      cwd: __dirname,
      stdio: ['ignore', 'pipe', 'ignore'],
    })
      .toString()
      .trim();
    return hash || 'unknown';
  } catch {
    return 'unknown';
  }
};

export const getVersionInfo = (env: NodeJS.ProcessEnv = process.env): VersionInfo => ({
  version: packageInfo.version,
  commit: readCommitHash(env),
});

export const formatVersion = (info: VersionInfo = getVersionInfo()): string =>
  `${info.version} (commit ${info.commit})`;
