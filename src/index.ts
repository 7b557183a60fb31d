#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './cli';
import { errorMessage } from './errors';

export { createProgram } from './cli';
export { DotfilesManager } from './dotfiles-manager';
export { loadVariables, parseVariables } from './variables';
export { renderTemplate, renderTemplateFile } from './template-renderer';
export { listPackages, resolvePackage } from './package-resolver';
export { processPackage } from './package-processor';
export { buildStowArgs, runStow } from './stow-runner';
export { createSettings } from './settings';
export * from './errors';
export * from './types';
export * from './constants';

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    });
}
