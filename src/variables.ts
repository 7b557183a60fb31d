import * as fs from 'fs-extra';
import { VariableMap } from './types';

/**
 * Parses newline-delimited `key=value` records.
 *
 * The key ends at the first `=`; everything after it is the value, verbatim.
 * Lines with an empty key and `#` comment lines are skipped.
 */
export function parseVariables(text: string, into: VariableMap = new Map()): VariableMap {
  for (const rawLine of text.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.startsWith('#')) continue;

    const separator = line.indexOf('=');
    const key = separator === -1 ? line : line.slice(0, separator);
    const value = separator === -1 ? '' : line.slice(separator + 1);

    if (key.length === 0) continue;
    into.set(key, value);
  }
  return into;
}

async function readIfPresent(filePath: string | undefined): Promise<string | null> {
  if (!filePath) return null;
  if (!await fs.pathExists(filePath)) return null;

  const stats = await fs.stat(filePath);
  if (!stats.isFile()) return null;

  return fs.readFile(filePath, 'utf8');
}

/**
 * Builds the variable mapping for a run: defaults first, host overrides second.
 * Missing sources contribute nothing.
 */
export async function loadVariables(defaultsPath?: string, hostPath?: string): Promise<VariableMap> {
  const variables: VariableMap = new Map();

  for (const source of [defaultsPath, hostPath]) {
    const text = await readIfPresent(source);
    if (text !== null) {
      parseVariables(text, variables);
    }
  }

  return variables;
}
