import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

export class PathResolver {
  /** `.runbook` under the working directory */
  static getProjectDir(): string {
    return resolve(process.cwd(), '.runbook');
  }

  /** $XDG_CONFIG_HOME/runbook, else ~/.config/runbook */
  static getUserConfigDir(): string {
    const configHome = process.env.XDG_CONFIG_HOME;
    return configHome ? join(configHome, 'runbook') : join(homedir(), '.config', 'runbook');
  }

  /**
   * Config files to try, first match wins: $RUNBOOK_CONFIG, then the
   * project directory, then the user config directory.
   */
  static getConfigPaths(): string[] {
    const explicit = process.env.RUNBOOK_CONFIG;
    const dirs = [PathResolver.getProjectDir(), PathResolver.getUserConfigDir()];
    return [
      ...(explicit ? [resolve(explicit)] : []),
      ...dirs.flatMap((dir) => [join(dir, 'config.yaml'), join(dir, 'config.yml')]),
    ];
  }

  static resolveDbPath(): string {
    return join(PathResolver.getProjectDir(), 'state.db');
  }

  /** Default directory for `capture_mode: file` output */
  static getCaptureDir(): string {
    return join(tmpdir(), 'runbook');
  }
}
