import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { DotfilesManager } from './dotfiles-manager';
import { errorMessage } from './errors';
import { ambientInput, createSettings } from './settings';
import { Settings, SettingsInput, StowRunner } from './types';

interface CommandOptions {
  hostname?: string;
  apply: boolean;
}

export type AmbientState = Pick<SettingsInput, 'rootDir' | 'env' | 'systemHostname' | 'homeDir'>;

export interface CliDependencies {
  ambient?: () => AmbientState;
  stowRunner?: StowRunner;
}

async function runCommand(task: () => Promise<unknown>): Promise<void> {
  try {
    await task();
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
}

async function promptHostname(detected: string): Promise<string> {
  const { hostname } = await inquirer.prompt<{ hostname: string }>([
    {
      type: 'input',
      name: 'hostname',
      message: 'Hostname for host-specific packages:',
      default: detected
    }
  ]);
  return hostname.trim() || detected;
}

function withSharedOptions(command: Command): Command {
  return command
    .option('-H, --hostname <host>', 'override detected hostname')
    .option('--apply', 'perform real changes (default: dry-run)', false);
}

export function createProgram(dependencies: CliDependencies = {}): Command {
  const ambient = dependencies.ambient ?? ambientInput;
  const program = new Command();

  const settingsFor = (packages: string[], options: CommandOptions): Settings =>
    createSettings({ ...ambient(), hostname: options.hostname, apply: options.apply, packages });

  const managerFor = (packages: string[], options: CommandOptions): DotfilesManager =>
    new DotfilesManager(settingsFor(packages, options), { stowRunner: dependencies.stowRunner });

  program
    .name('manage')
    .description('Render host-aware dotfiles packages and link them with GNU Stow')
    .version('1.0.0')
    .helpCommand(false)
    .showHelpAfterError();

  withSharedOptions(
    program.command('build [packages...]').description('Render templates to ./tmp/build directory')
  ).action(async (packages: string[], options: CommandOptions) => {
    await runCommand(() => managerFor(packages, options).build());
  });

  withSharedOptions(
    program.command('stow [packages...]').description('Apply changes using stow (dry-run by default)')
  ).action(async (packages: string[], options: CommandOptions) => {
    await runCommand(() => managerFor(packages, options).stow());
  });

  withSharedOptions(
    program.command('unstow [packages...]').description('Remove stow symlinks (dry-run by default)')
  ).action(async (packages: string[], options: CommandOptions) => {
    await runCommand(() => managerFor(packages, options).unstow());
  });

  withSharedOptions(
    program.command('restow [packages...]').description('Remove and reapply stow symlinks (dry-run by default)')
  ).action(async (packages: string[], options: CommandOptions) => {
    await runCommand(() => managerFor(packages, options).restow());
  });

  withSharedOptions(
    program.command('list [packages...]').description('Show which directory each package resolves to')
  ).action(async (packages: string[], options: CommandOptions) => {
    await runCommand(() => managerFor(packages, options).list());
  });

  program
    .command('init')
    .description('Create the config and packages layout in the current directory')
    .option('-H, --hostname <host>', 'hostname to create host-specific directories for')
    .action(async (options: { hostname?: string }) => {
      await runCommand(async () => {
        const state = ambient();
        const hostname = options.hostname ?? await promptHostname(state.systemHostname);
        await DotfilesManager.initProject(createSettings({ ...state, hostname }));
      });
    });

  program
    .command('help')
    .description('Show this help message')
    .action(() => {
      program.help({ error: true });
    });

  return program;
}
