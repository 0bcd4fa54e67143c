import { spawn, type ChildProcess } from 'child_process';
import type { AudioPlayerAdapter, PlaybackHandle } from '@chordcast/platform';
import { playbackCommand } from './commands';

type Spawner = (command: string, args: string[]) => ChildProcess;

const defaultSpawner: Spawner = (command, args) =>
  spawn(command, args, { stdio: 'ignore', windowsHide: true });

/** Plays WAV files with the platform's command-line player; stopping kills the player process. */
export const createCommandPlayer = (
  options: { platform?: NodeJS.Platform; spawner?: Spawner } = {}
): AudioPlayerAdapter => {
  const platform = options.platform ?? process.platform;
  const spawner = options.spawner ?? defaultSpawner;

  const start = (filePath: string, playOptions: { volume?: number } = {}) =>
    new Promise<PlaybackHandle>((resolve, reject) => {
      const { command, args } = playbackCommand(platform, filePath, playOptions.volume);
      const child = spawner(command, args);
      let running = true;
      const exited = new Promise<void>((resolveExit) => {
        child.once('exit', () => {
          running = false;
          resolveExit();
        });
      });
      child.once('error', (error) => {
        running = false;
        reject(error);
      });
      child.once('spawn', () =>
        resolve({
          isPlaying: () => running,
          stop: async () => {
            if (!running) return;
            child.kill();
            await exited;
          },
        })
      );
    });

  return { start };
};
