import { mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';

export interface AppPaths {
  root: string;
  settingsFile: string;
  logFile: string;
  historyDir: string;
  modelCacheDir: string;
  diagnosticsDir: string;
  errorsFile: string;
}

export const userDataDir = (env: NodeJS.ProcessEnv = process.env) =>
  env.CHORDCAST_HOME?.trim() || join(homedir(), '.chordcast');

export const resolvePaths = (root = userDataDir()): AppPaths => ({
  root,
  settingsFile: join(root, 'settings.json'),
  logFile: join(root, 'logs', 'chordcast.log'),
  historyDir: join(root, 'history'),
  modelCacheDir: join(root, 'cache', 'models'),
  diagnosticsDir: join(root, 'diagnostics'),
  errorsFile: join(root, 'recent-errors.json'),
});

export const ensureDirectories = (paths: AppPaths) => {
  const dirs = [
    paths.root,
    paths.historyDir,
    paths.modelCacheDir,
    paths.diagnosticsDir,
    join(paths.root, 'logs'),
  ];
  dirs.forEach((dir) => mkdirSync(dir, { recursive: true }));
};
