import * as fs from 'fs-extra';
import * as path from 'path';
import { glob } from 'glob';
import { TEMPLATE_SUFFIX } from './constants';
import { errorMessage, PackageNotFoundError } from './errors';
import { consoleLogger, Logger } from './logger';
import { isDirectory } from './package-resolver';
import { renderTemplateFile } from './template-renderer';
import { Environment, ProcessResult, ResolvedFile, ResolvedPackage, VariableMap } from './types';

export function resolveFile(packageDir: string, targetDir: string, relativePath: string): ResolvedFile {
  const isTemplate = relativePath.endsWith(TEMPLATE_SUFFIX);
  const destinationPath = isTemplate ? relativePath.slice(0, -TEMPLATE_SUFFIX.length) : relativePath;

  return {
    source: path.join(packageDir, relativePath),
    destination: path.join(targetDir, destinationPath),
    relativePath,
    kind: isTemplate ? 'template' : 'plain'
  };
}

/**
 * Regular files only: symbolic links, whether to files, directories or
 * nowhere, are not part of a package.
 */
export async function listPackageFiles(packageDir: string): Promise<string[]> {
  const entries = await glob('**/*', { cwd: packageDir, dot: true, withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.relative())
    .sort();
}

/**
 * Renders or copies every file of `pkg` into `<targetRoot>/<pkg.name>`,
 * keeping relative paths. A failing file is recorded and the rest continue.
 */
export async function processPackage(
  pkg: ResolvedPackage,
  targetRoot: string,
  variables: VariableMap,
  env: Environment = {},
  logger: Logger = consoleLogger
): Promise<ProcessResult> {
  if (!await isDirectory(pkg.dir)) {
    throw new PackageNotFoundError(pkg.name, pkg.dir);
  }

  const targetDir = path.join(targetRoot, pkg.name);
  await fs.ensureDir(targetDir);

  const result: ProcessResult = { package: pkg.name, rendered: [], copied: [], failures: [] };

  for (const relativePath of await listPackageFiles(pkg.dir)) {
    const file = resolveFile(pkg.dir, targetDir, relativePath);

    try {
      if (file.kind === 'template') {
        await renderTemplateFile(file.source, file.destination, variables, env);
        result.rendered.push(relativePath);
        logger.detail(`Rendered: ${relativePath}`);
      } else {
        await fs.ensureDir(path.dirname(file.destination));
        await fs.copy(file.source, file.destination, { overwrite: true });
        result.copied.push(relativePath);
        logger.detail(`Copied: ${relativePath}`);
      }
    } catch (error) {
      const message = errorMessage(error);
      result.failures.push({ file: relativePath, error: message });
      logger.error(`Failed to process ${path.join(pkg.name, relativePath)}: ${message}`);
    }
  }

  return result;
}
