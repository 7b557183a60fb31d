export type VariableMap = Map<string, string>;

export type Environment = Record<string, string | undefined>;

export type PackageScope = 'host' | 'common';

export type FileKind = 'template' | 'plain';

export type StowMode = 'stow' | 'unstow' | 'restow';

export interface PackageLayout {
  commonRoot: string;
  hostRoot: string;
}

export interface ResolvedPackage {
  name: string;
  dir: string;
  scope: PackageScope;
}

export interface ResolvedFile {
  source: string;
  destination: string;
  relativePath: string;
  kind: FileKind;
}

export interface FileFailure {
  file: string;
  error: string;
}

export interface ProcessResult {
  package: string;
  rendered: string[];
  copied: string[];
  failures: FileFailure[];
}

export interface SettingsInput {
  rootDir: string;
  hostname?: string;
  apply?: boolean;
  packages?: string[];
  env: Environment;
  systemHostname: string;
  homeDir: string;
}

export interface Settings {
  rootDir: string;
  hostname: string;
  dryRun: boolean;
  packages: string[];
  env: Environment;
  home: string;
  defaultsFile: string;
  hostConfigFile: string;
  layout: PackageLayout;
  buildDir: string;
  stagingDir: string;
}

export interface StowOptions {
  mode: StowMode;
  dryRun: boolean;
  home: string;
}

export type StowRunner = (args: string[], cwd: string) => Promise<number>;
