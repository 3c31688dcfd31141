import { formatCommandFailure, runCommand, type CommandRunner } from './commandRunner';

export const DEFAULT_THUMBNAIL_SIZE = '200x150';
export const THUMBNAIL_FILE_NAME = 'thumbnail.png';
const DEFAULT_THUMBNAIL_TIMEOUT_MS = 2 * 60 * 1000;

const thumbnailSizePattern = /^[1-9][0-9]{0,4}x[1-9][0-9]{0,4}$/;

export interface ThumbnailHook {
  capture(gameDirectoryPath: string, size: string): Promise<void>;
}

export function isThumbnailSize(value: string): boolean {
  return thumbnailSizePattern.test(value);
}

type CommandThumbnailHookOptions = {
  command: string;
  run?: CommandRunner;
  timeoutMs?: number;
};

// Runs `<command> <gameDirectory> <size>`; the command is expected to leave thumbnail.png in the directory.
export class CommandThumbnailHook implements ThumbnailHook {
  private readonly command: string;
  private readonly run: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: CommandThumbnailHookOptions) {
    this.command = options.command;
    this.run = options.run ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_THUMBNAIL_TIMEOUT_MS;
  }

  async capture(gameDirectoryPath: string, size: string): Promise<void> {
    const args = [gameDirectoryPath, size];
    const result = await this.run(this.command, args, { timeoutMs: this.timeoutMs });
    if (result.timedOut) {
      throw new Error(`Thumbnail command timed out after ${this.timeoutMs}ms`);
    }

    if (result.exitCode !== 0) {
      throw new Error(formatCommandFailure(this.command, args, result));
    }
  }
}
