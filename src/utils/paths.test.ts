import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PathResolver } from './paths.ts';

describe('PathResolver', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should return correct project directory', () => {
    expect(PathResolver.getProjectDir()).toBe(join(process.cwd(), '.runbook'));
  });

  it('should respect XDG_CONFIG_HOME', () => {
    process.env.XDG_CONFIG_HOME = '/custom/config';
    expect(PathResolver.getUserConfigDir()).toBe('/custom/config/runbook');
  });

  it('should fallback to ~/.config if XDG_CONFIG_HOME is not set', () => {
    delete process.env.XDG_CONFIG_HOME;
    expect(PathResolver.getUserConfigDir()).toBe(join(homedir(), '.config', 'runbook'));
  });

  it('should put RUNBOOK_CONFIG first', () => {
    process.env.RUNBOOK_CONFIG = '/absolute/path/to/config.yaml';
    const paths = PathResolver.getConfigPaths();
    expect(paths[0]).toBe('/absolute/path/to/config.yaml');
    expect(paths[1]).toBe(join(process.cwd(), '.runbook', 'config.yaml'));
  });

  it('should list project then user config files', () => {
    delete process.env.RUNBOOK_CONFIG;
    process.env.XDG_CONFIG_HOME = '/custom/config';
    expect(PathResolver.getConfigPaths()).toEqual([
      join(process.cwd(), '.runbook', 'config.yaml'),
      join(process.cwd(), '.runbook', 'config.yml'),
      '/custom/config/runbook/config.yaml',
      '/custom/config/runbook/config.yml',
    ]);
  });

  it('should keep the state database in the project directory', () => {
    expect(PathResolver.resolveDbPath()).toBe(join(process.cwd(), '.runbook', 'state.db'));
  });

  it('should keep captured output under the temp dir', () => {
    expect(PathResolver.getCaptureDir()).toBe(join(tmpdir(), 'runbook'));
  });
});
