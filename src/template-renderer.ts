import * as fs from 'fs-extra';
import * as path from 'path';
import { TemplateSyntaxError } from './errors';
import { Environment, VariableMap } from './types';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function positionOf(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (text[i] === '\n') line++;
  }
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  return { line, column: offset - lineStart + 1 };
}

function lookup(name: string, variables: VariableMap, env: Environment): string {
  return variables.get(name) ?? env[name] ?? '';
}

/**
 * Replaces every `${NAME}` in `text`.
 *
 * Lookup order is the variable mapping, then the environment snapshot, then
 * the empty string. A `$` without a following `{` is left alone.
 *
 * @throws TemplateSyntaxError on an unterminated reference or an invalid name
 */
export function renderTemplate(text: string, variables: VariableMap, env: Environment = {}): string {
  let output = '';
  let index = 0;

  while (index < text.length) {
    const start = text.indexOf('${', index);
    if (start === -1) {
      output += text.slice(index);
      break;
    }
    output += text.slice(index, start);

    const end = text.indexOf('}', start + 2);
    const lineEnd = text.indexOf('\n', start);
    if (end === -1 || (lineEnd !== -1 && lineEnd < end)) {
      const { line, column } = positionOf(text, start);
      throw new TemplateSyntaxError(line, column, 'Unterminated variable reference');
    }

    const name = text.slice(start + 2, end);
    if (!VARIABLE_NAME.test(name)) {
      const { line, column } = positionOf(text, start);
      throw new TemplateSyntaxError(line, column, `Bad substitution '${text.slice(start, end + 1)}'`);
    }

    output += lookup(name, variables, env);
    index = end + 1;
  }

  return output;
}

function toByteString(value: string): string {
  return Buffer.from(value, 'utf8').toString('latin1');
}

/**
 * Renders `source` into `destination`. The destination is written only once
 * the whole template has rendered.
 *
 * The template is handled one character per byte, so bytes outside the
 * references are written back unchanged whatever the file's encoding.
 * Substituted values are written as UTF-8.
 */
export async function renderTemplateFile(
  source: string,
  destination: string,
  variables: VariableMap,
  env: Environment = {}
): Promise<void> {
  const text = (await fs.readFile(source)).toString('latin1');

  const byteVariables: VariableMap = new Map();
  for (const [key, value] of variables) {
    byteVariables.set(key, toByteString(value));
  }
  const byteEnv: Environment = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      byteEnv[key] = toByteString(value);
    }
  }

  const rendered = renderTemplate(text, byteVariables, byteEnv);

  await fs.ensureDir(path.dirname(destination));
  await fs.writeFile(destination, rendered, 'latin1');
}
