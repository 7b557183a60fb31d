import * as os from 'os';
import * as path from 'path';
import {
  BUILD_DIR,
  COMMON_DIR,
  CONFIG_DIR,
  DEFAULTS_FILE,
  HOST_CONFIG_EXT,
  HOST_SPECIFIC_DIR,
  PACKAGES_DIR,
  settingsSchema,
  STAGING_DIR_NAME
} from './constants';
import { ConfigValidationError } from './errors';
import { Environment, Settings, SettingsInput } from './types';

/**
 * Copies the defined entries of an environment so later mutation of
 * `process.env` does not leak into a run.
 */
export function snapshotEnvironment(env: NodeJS.ProcessEnv): Environment {
  const snapshot: Environment = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      snapshot[key] = value;
    }
  }
  return snapshot;
}

/**
 * Captures the ambient state a run depends on: working directory, hostname,
 * home directory and environment.
 */
export function ambientInput(): Pick<SettingsInput, 'rootDir' | 'env' | 'systemHostname' | 'homeDir'> {
  return {
    rootDir: process.cwd(),
    env: snapshotEnvironment(process.env),
    systemHostname: os.hostname(),
    homeDir: os.homedir()
  };
}

export function createSettings(input: SettingsInput): Settings {
  const { error, value } = settingsSchema.validate(input);
  if (error) {
    throw new ConfigValidationError(error.message);
  }

  const rootDir = path.resolve(value.rootDir);
  const hostname = value.hostname ?? value.systemHostname;
  const home = value.env.HOME || value.homeDir;
  const dataHome = value.env.XDG_DATA_HOME || path.join(home, '.local', 'share');
  const packagesRoot = path.join(rootDir, PACKAGES_DIR);

  const packages: string[] = [];
  for (const name of value.packages ?? []) {
    if (!packages.includes(name)) {
      packages.push(name);
    }
  }

  return {
    rootDir,
    hostname,
    dryRun: !value.apply,
    packages,
    env: value.env,
    home,
    defaultsFile: path.join(rootDir, CONFIG_DIR, DEFAULTS_FILE),
    hostConfigFile: path.join(rootDir, CONFIG_DIR, `${hostname}${HOST_CONFIG_EXT}`),
    layout: {
      commonRoot: path.join(packagesRoot, COMMON_DIR),
      hostRoot: path.join(packagesRoot, HOST_SPECIFIC_DIR, hostname)
    },
    buildDir: path.join(rootDir, BUILD_DIR),
    stagingDir: path.join(dataHome, STAGING_DIR_NAME)
  };
}
