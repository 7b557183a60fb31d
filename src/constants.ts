import Joi from 'joi';
import { SettingsInput, StowMode } from './types';

export const TEMPLATE_SUFFIX = '.tmpl';
export const CONFIG_DIR = 'config';
export const DEFAULTS_FILE = 'defaults';
export const HOST_CONFIG_EXT = '.conf';
export const PACKAGES_DIR = 'packages';
export const COMMON_DIR = 'common';
export const HOST_SPECIFIC_DIR = 'host-specific';
export const BUILD_DIR = 'tmp/build';
export const STAGING_DIR_NAME = 'dotfiles';
export const STOW_COMMAND = 'stow';

export const STOW_FLAGS: Record<StowMode, string[]> = {
  stow: [],
  unstow: ['-D'],
  restow: ['-R']
};

export const STOW_MESSAGES: Record<StowMode, { operation: string; message: string; action: string }> = {
  stow: { operation: 'Stowing', message: 'Applying changes using stow', action: 'apply changes using stow' },
  unstow: { operation: 'Unstowing', message: 'Removing stow symlinks', action: 'remove stow symlinks' },
  restow: { operation: 'Restowing', message: 'Restowing packages', action: 'restow packages' }
};

const pathSegment = Joi.string()
  .pattern(/^[^/\\]+$/, 'single path segment')
  .invalid('.', '..');

export const settingsSchema = Joi.object<SettingsInput>({
  rootDir: Joi.string().required(),
  hostname: pathSegment.optional(),
  apply: Joi.boolean().default(false),
  packages: Joi.array().items(pathSegment).default([]),
  env: Joi.object().pattern(Joi.string(), Joi.string().allow('')).required(),
  systemHostname: pathSegment.required(),
  homeDir: Joi.string().required()
}).required();
