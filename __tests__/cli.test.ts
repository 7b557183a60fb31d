import * as fs from 'fs-extra';
import * as path from 'path';
import inquirer from 'inquirer';
import { Command } from 'commander';
import { createProgram } from '../src/cli';
import { StowRunner } from '../src/types';
import { ambientFor, createWorkspace, setupDotfiles } from './helpers';

jest.mock('inquirer');
jest.mock('chalk', () => ({
  green: jest.fn((text: string) => text),
  red: jest.fn((text: string) => text),
  yellow: jest.fn((text: string) => text),
  blue: jest.fn((text: string) => text),
  cyan: jest.fn((text: string) => text),
  gray: jest.fn((text: string) => text),
  bold: jest.fn((text: string) => text),
  default: {
    green: jest.fn((text: string) => text),
    red: jest.fn((text: string) => text),
    yellow: jest.fn((text: string) => text),
    blue: jest.fn((text: string) => text),
    cyan: jest.fn((text: string) => text),
    gray: jest.fn((text: string) => text),
    bold: jest.fn((text: string) => text),
  }
}));

describe('manage CLI', () => {
  let root: string;
  let stowRunner: jest.MockedFunction<StowRunner>;
  let program: Command;
  let stderr: string;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let processExitSpy: jest.SpyInstance;

  const run = (...args: string[]) => program.parseAsync(['node', 'manage', ...args]);

  beforeEach(async () => {
    root = await createWorkspace();
    await setupDotfiles(root);

    stowRunner = jest.fn<Promise<number>, [string[], string]>().mockResolvedValue(0);
    program = createProgram({ ambient: () => ambientFor(root), stowRunner });
    stderr = '';
    program.configureOutput({
      writeOut: () => undefined,
      writeErr: (text) => {
        stderr += text;
      }
    });

    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    processExitSpy = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`Process exit with code ${code}`);
    });
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
    jest.clearAllMocks();
    await fs.remove(root);
  });

  describe('Commands', () => {
    it('should build the requested packages', async () => {
      await run('build', 'git');

      expect(await fs.pathExists(path.join(root, 'tmp', 'build', 'git', 'dot-gitconfig'))).toBe(true);
      expect(await fs.pathExists(path.join(root, 'tmp', 'build', 'zsh'))).toBe(false);
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it('should not fail the run for a missing package', async () => {
      await run('build', 'missing', 'git');

      expect(consoleErrorSpy).toHaveBeenCalledWith('✗', 'Package not found: missing');
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it('should pass the hostname override and apply flag through to stow', async () => {
      await run('stow', '--apply', '-H', 'otherhost', 'zsh');

      const home = path.join(root, 'home');
      const staging = path.join(root, 'data', 'dotfiles');
      expect(stowRunner).toHaveBeenCalledWith(['--dotfiles', '-v', '-t', home, 'zsh'], staging);
      expect(await fs.readFile(path.join(staging, 'zsh', 'dot-zshrc'), 'utf8')).toBe('export NAME=default\n');
    });

    it('should exit with an error when the staging directory is missing', async () => {
      await expect(run('unstow')).rejects.toThrow('Process exit with code 1');

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        'Error:',
        `Failed to change to directory: ${path.join(root, 'data', 'dotfiles')}`
      );
      expect(stowRunner).not.toHaveBeenCalled();
    });

    it('should reject a hostname that is not a single path segment', async () => {
      await expect(run('build', '-H', '../etc')).rejects.toThrow('Process exit with code 1');

      expect(consoleErrorSpy).toHaveBeenCalledWith('Error:', expect.stringContaining('Invalid options'));
      expect(await fs.pathExists(path.join(root, 'tmp'))).toBe(false);
    });

    it('should list resolved packages', async () => {
      await run('list');

      expect(consoleLogSpy).toHaveBeenCalledWith(`  git  common  ${path.join('packages', 'common', 'git')}`);
    });
  });

  describe('Usage', () => {
    it('should print usage and exit non-zero for the help command', async () => {
      await expect(run('help')).rejects.toThrow('Process exit with code 1');

      expect(stderr).toContain('Usage: manage');
      expect(stderr).toContain('restow');
    });

    it('should exit zero for the help option', async () => {
      await expect(run('build', '--help')).rejects.toThrow('Process exit with code 0');
    });

    it('should reject an unknown command', async () => {
      await expect(run('frobnicate')).rejects.toThrow('Process exit with code 1');

      expect(stderr).toContain("error: unknown command 'frobnicate'");
    });

    it('should print usage when no command is given', async () => {
      await expect(run()).rejects.toThrow('Process exit with code 1');

      expect(stderr).toContain('Usage: manage');
    });
  });

  describe('init', () => {
    let empty: string;

    beforeEach(async () => {
      empty = await createWorkspace();
      program = createProgram({ ambient: () => ambientFor(empty), stowRunner });
    });

    afterEach(async () => {
      await fs.remove(empty);
    });

    it('should use the hostname option without prompting', async () => {
      await run('init', '-H', 'desk');

      const inquirerMock = inquirer as jest.Mocked<typeof inquirer>;
      expect(inquirerMock.prompt).not.toHaveBeenCalled();
      expect(await fs.pathExists(path.join(empty, 'config', 'desk.conf'))).toBe(true);
    });

    it('should ask for the hostname when none is given', async () => {
      const inquirerMock = inquirer as jest.Mocked<typeof inquirer>;
      inquirerMock.prompt.mockResolvedValueOnce({ hostname: 'prompted' });

      await run('init');

      expect(inquirerMock.prompt).toHaveBeenCalledWith([
        expect.objectContaining({ name: 'hostname', default: 'testhost' })
      ]);
      expect(await fs.pathExists(path.join(empty, 'config', 'prompted.conf'))).toBe(true);
      expect(await fs.pathExists(path.join(empty, 'packages', 'host-specific', 'prompted'))).toBe(true);
    });
  });
});
