import { spawn } from 'child_process';
import { STOW_COMMAND, STOW_FLAGS } from './constants';
import { StowNotFoundError } from './errors';
import { StowOptions, StowRunner } from './types';

/**
 * Argument vector for one stow invocation on one package.
 * Example: `['--dotfiles', '-v', '-n', '-D', '-t', '/home/me', 'zsh']`
 */
export function buildStowArgs(pkg: string, options: StowOptions): string[] {
  const args = ['--dotfiles', '-v'];
  if (options.dryRun) {
    args.push('-n');
  }
  args.push(...STOW_FLAGS[options.mode]);
  args.push('-t', options.home, pkg);
  return args;
}

/**
 * Spawns stow without a shell and resolves with its exit code.
 */
export function runStow(args: string[], cwd: string, command: string = STOW_COMMAND): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: 'inherit',
      shell: false
    });

    child.on('error', (error) => {
      if ('code' in error && error.code === 'ENOENT') {
        reject(new StowNotFoundError(command));
      } else {
        reject(error);
      }
    });

    child.on('exit', (code) => {
      resolve(code ?? 1);
    });
  });
}

export const defaultStowRunner: StowRunner = (args, cwd) => runStow(args, cwd);
