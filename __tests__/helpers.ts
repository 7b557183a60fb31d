import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { createSettings } from '../src/settings';
import { Settings, SettingsInput } from '../src/types';

export const TEST_HOST = 'testhost';

export async function createWorkspace(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'dotstow-test-'));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, content);
  }
}

export function ambientFor(root: string): Pick<SettingsInput, 'rootDir' | 'env' | 'systemHostname' | 'homeDir'> {
  return {
    rootDir: root,
    env: {
      HOME: path.join(root, 'home'),
      XDG_DATA_HOME: path.join(root, 'data')
    },
    systemHostname: TEST_HOST,
    homeDir: path.join(root, 'home')
  };
}

export function testSettings(root: string, overrides: Partial<SettingsInput> = {}): Settings {
  return createSettings({ ...ambientFor(root), ...overrides });
}

/**
 * A small dotfiles repository: `zsh` exists in both scopes, `git` only in common.
 */
export async function setupDotfiles(root: string): Promise<void> {
  await writeFiles(root, {
    'config/defaults': 'NAME=default\nEMAIL=me@example.com\n',
    [`config/${TEST_HOST}.conf`]: 'NAME=host\n',
    'packages/common/zsh/dot-zshrc.tmpl': 'export NAME=${NAME}\n',
    'packages/common/zsh/common-only.zsh': 'common only\n',
    'packages/common/git/dot-gitconfig.tmpl': '[user]\n  email = ${EMAIL}\n',
    [`packages/host-specific/${TEST_HOST}/zsh/dot-zshrc.tmpl`]: 'host zsh for ${NAME}\n',
    [`packages/host-specific/${TEST_HOST}/zsh/extra.zsh`]: 'alias ll=ls\n'
  });
}
