/**
 * Destination directory selection.
 */

import * as os from 'node:os';
import * as path from 'node:path';

export const APP_DIRECTORY = 'corpus-sync';

export interface HostInfo {
  platform: NodeJS.Platform;
  homeDir: string;
  env: Record<string, string | undefined>;
}

function currentHost(): HostInfo {
  return { platform: process.platform, homeDir: os.homedir(), env: process.env };
}

/**
 * Parent directory datasets are written under when no --path is given.
 *
 * - dataHome (CORPUS_SYNC_HOME) wins when set
 * - Linux: $XDG_DATA_HOME/corpus-sync, else ~/.local/share/corpus-sync
 * - macOS: ~/Downloads
 * - Windows: %USERPROFILE%\Downloads
 */
export function defaultParentDirectory(dataHome?: string, host: HostInfo = currentHost()): string {
  if (dataHome) {
    return dataHome;
  }

  switch (host.platform) {
    case 'win32':
      return path.win32.join(host.env['USERPROFILE'] ?? host.homeDir, 'Downloads');
    case 'darwin':
      return path.posix.join(host.homeDir, 'Downloads');
    default: {
      const dataDir = host.env['XDG_DATA_HOME'] || path.posix.join(host.homeDir, '.local', 'share');
      return path.posix.join(dataDir, APP_DIRECTORY);
    }
  }
}

export interface DestinationOptions {
  /** --path value, when given */
  parent?: string;

  /** Dataset directory appended to the parent */
  directoryName: string;

  /** False when --no-subfolder was given */
  appendSubfolder: boolean;

  dataHome?: string;
}

/**
 * Absolute directory a dataset is written into.
 * The default parent always gets the dataset directory appended.
 */
export function resolveDestination(options: DestinationOptions, host: HostInfo = currentHost()): string {
  if (options.parent === undefined) {
    return path.resolve(defaultParentDirectory(options.dataHome, host), options.directoryName);
  }
  const parent = path.resolve(options.parent);
  return options.appendSubfolder ? path.join(parent, options.directoryName) : parent;
}
