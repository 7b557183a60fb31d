import * as fs from 'fs-extra';
import * as path from 'path';
import { PackageLayout, ResolvedPackage } from './types';

export async function isDirectory(dirPath: string): Promise<boolean> {
  if (!await fs.pathExists(dirPath)) return false;
  const stats = await fs.stat(dirPath);
  return stats.isDirectory();
}

async function packageNames(root: string): Promise<string[]> {
  if (!await isDirectory(root)) return [];

  const entries = await fs.readdir(root, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Host-specific directory first, then common. Returns `null` when neither exists.
 */
export async function resolvePackage(name: string, layout: PackageLayout): Promise<ResolvedPackage | null> {
  const hostDir = path.join(layout.hostRoot, name);
  if (await isDirectory(hostDir)) {
    return { name, dir: hostDir, scope: 'host' };
  }

  const commonDir = path.join(layout.commonRoot, name);
  if (await isDirectory(commonDir)) {
    return { name, dir: commonDir, scope: 'common' };
  }

  return null;
}

/**
 * Every discoverable package exactly once: host-specific packages, then the
 * common packages they do not shadow.
 */
export async function listPackages(layout: PackageLayout): Promise<ResolvedPackage[]> {
  const packages: ResolvedPackage[] = [];

  const hostNames = await packageNames(layout.hostRoot);
  for (const name of hostNames) {
    packages.push({ name, dir: path.join(layout.hostRoot, name), scope: 'host' });
  }

  for (const name of await packageNames(layout.commonRoot)) {
    if (hostNames.includes(name)) continue;
    packages.push({ name, dir: path.join(layout.commonRoot, name), scope: 'common' });
  }

  return packages;
}
