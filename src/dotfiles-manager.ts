import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import { CONFIG_DIR, STOW_MESSAGES } from './constants';
import { errorMessage, TargetUnreachableError } from './errors';
import { consoleLogger, Logger } from './logger';
import { processPackage } from './package-processor';
import { isDirectory, listPackages, resolvePackage } from './package-resolver';
import { buildStowArgs, defaultStowRunner } from './stow-runner';
import { ProcessResult, ResolvedPackage, Settings, StowMode, StowRunner, VariableMap } from './types';
import { loadVariables } from './variables';

const GITIGNORE_MARKER = '# dotstow - rendered output';

export interface ManagerDependencies {
  stowRunner?: StowRunner;
  logger?: Logger;
}

export interface StowOutcome {
  package: string;
  exitCode: number;
}

export class DotfilesManager {
  private variables: VariableMap | null = null;
  private readonly stowRunner: StowRunner;
  private readonly logger: Logger;

  constructor(private readonly settings: Settings, dependencies: ManagerDependencies = {}) {
    this.stowRunner = dependencies.stowRunner ?? defaultStowRunner;
    this.logger = dependencies.logger ?? consoleLogger;
  }

  async init(): Promise<void> {
    const { settings, logger } = this;

    logger.info(`Using hostname: ${settings.hostname}`);
    logger.info(`Host config: ${settings.hostConfigFile}`);
    logger.info(`Common packages directory: ${settings.layout.commonRoot}`);
    logger.info(`Host packages directory: ${settings.layout.hostRoot}`);

    this.variables = await loadVariables(settings.defaultsFile, settings.hostConfigFile);
  }

  private async requireVariables(): Promise<VariableMap> {
    if (!this.variables) {
      await this.init();
    }
    return this.variables ?? new Map();
  }

  async resolveRequested(): Promise<ResolvedPackage[]> {
    const { settings, logger } = this;

    if (settings.packages.length === 0) {
      return listPackages(settings.layout);
    }

    const resolved: ResolvedPackage[] = [];
    for (const name of settings.packages) {
      const pkg = await resolvePackage(name, settings.layout);
      if (pkg) {
        resolved.push(pkg);
      } else {
        logger.error(`Package not found: ${name}`);
      }
    }
    return resolved;
  }

  async renderPackages(targetRoot: string): Promise<ProcessResult[]> {
    const variables = await this.requireVariables();
    const results: ProcessResult[] = [];

    await fs.ensureDir(targetRoot);

    for (const pkg of await this.resolveRequested()) {
      this.logger.info(
        pkg.scope === 'host'
          ? `Processing host-specific package: ${pkg.name}`
          : `Processing common package: ${pkg.name}`
      );

      try {
        results.push(await processPackage(pkg, targetRoot, variables, this.settings.env, this.logger));
      } catch (error) {
        this.logger.error(errorMessage(error));
      }
    }

    return results;
  }

  async build(): Promise<ProcessResult[]> {
    const results = await this.renderPackages(this.settings.buildDir);
    this.logger.success(`Build completed. Files were rendered to: ${this.settings.buildDir}`);
    return results;
  }

  async stow(): Promise<StowOutcome[]> {
    this.logger.info('Preparing files for stow...');
    await this.renderPackages(this.settings.stagingDir);
    return this.executeStow('stow');
  }

  async unstow(): Promise<StowOutcome[]> {
    return this.executeStow('unstow');
  }

  async restow(): Promise<StowOutcome[]> {
    return this.executeStow('restow');
  }

  private async stagedPackages(): Promise<string[]> {
    const { settings, logger } = this;

    if (settings.packages.length === 0) {
      const entries = await fs.readdir(settings.stagingDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    }

    const staged: string[] = [];
    for (const name of settings.packages) {
      if (await isDirectory(path.join(settings.stagingDir, name))) {
        staged.push(name);
      } else {
        logger.error(`Package not found: ${name}`);
      }
    }
    return staged;
  }

  /**
   * Runs stow once per staged package.
   *
   * @throws TargetUnreachableError when the staging directory is missing
   */
  async executeStow(mode: StowMode): Promise<StowOutcome[]> {
    const { settings, logger } = this;
    const { operation, message, action } = STOW_MESSAGES[mode];

    logger.info(message);
    if (!await isDirectory(settings.stagingDir)) {
      throw new TargetUnreachableError(settings.stagingDir);
    }

    const staged = await this.stagedPackages();
    if (staged.length === 0) {
      logger.warn(`No packages to ${mode} in ${settings.stagingDir}`);
    }

    const outcomes: StowOutcome[] = [];
    for (const name of staged) {
      logger.info(`${operation} package: ${name}`);

      const args = buildStowArgs(name, { mode, dryRun: settings.dryRun, home: settings.home });
      const exitCode = await this.stowRunner(args, settings.stagingDir);
      if (exitCode !== 0) {
        logger.error(`stow exited with code ${exitCode} for package: ${name}`);
      }
      outcomes.push({ package: name, exitCode });
    }

    if (settings.dryRun) {
      logger.info(`Dry run completed. Use --apply to actually ${action}.`);
    } else {
      logger.success(`${message} completed successfully`);
    }

    return outcomes;
  }

  async list(): Promise<ResolvedPackage[]> {
    const packages = await this.resolveRequested();

    console.log(chalk.bold(`\nPackages for ${this.settings.hostname}:\n`));
    if (packages.length === 0) {
      console.log(chalk.yellow('No packages found'));
    }
    for (const pkg of packages) {
      const scope = pkg.scope === 'host' ? chalk.cyan('host') : chalk.gray('common');
      console.log(`  ${pkg.name}  ${scope}  ${path.relative(this.settings.rootDir, pkg.dir)}`);
    }
    console.log('');

    return packages;
  }

  static async initProject(settings: Settings, logger: Logger = consoleLogger): Promise<void> {
    console.log(chalk.bold('Initializing dotfiles layout\n'));

    if (await fs.pathExists(settings.defaultsFile)) {
      console.log(chalk.yellow('dotstow is already initialized'));
      return;
    }

    await fs.ensureDir(path.join(settings.rootDir, CONFIG_DIR));
    await fs.writeFile(settings.defaultsFile, '# Default template variables, one KEY=value per line\n');
    logger.success(`Created ${path.relative(settings.rootDir, settings.defaultsFile)}`);

    if (!await fs.pathExists(settings.hostConfigFile)) {
      await fs.writeFile(settings.hostConfigFile, `# Overrides for ${settings.hostname}\n`);
      logger.success(`Created ${path.relative(settings.rootDir, settings.hostConfigFile)}`);
    }

    await fs.ensureDir(settings.layout.commonRoot);
    await fs.ensureDir(settings.layout.hostRoot);
    logger.success('Created package directories');

    const gitignorePath = path.join(settings.rootDir, '.gitignore');
    let gitignoreContent = '';

    if (await fs.pathExists(gitignorePath)) {
      gitignoreContent = await fs.readFile(gitignorePath, 'utf8');
    }

    if (!gitignoreContent.includes(GITIGNORE_MARKER)) {
      gitignoreContent += `\n${GITIGNORE_MARKER}\ntmp/\n`;
      await fs.writeFile(gitignorePath, gitignoreContent);
      logger.success('Updated .gitignore');
    }

    console.log(chalk.green('\n✓ dotfiles layout initialized successfully!'));
    console.log(chalk.gray('\nNext steps:'));
    console.log(chalk.gray('1. Add shared variables to config/defaults'));
    console.log(chalk.gray('2. Put packages under packages/common/ or packages/host-specific/<host>/'));
    console.log(chalk.gray('3. Run "manage build" to render them into tmp/build'));
  }
}
