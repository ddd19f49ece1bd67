import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { globby } from 'globby';
import type { CliConfig } from '../types/index.js';
import { UsageError } from './config.js';

/**
 * A statement to evaluate and the label its result is printed under
 */
export interface StatementSource {
  label: string;
  text: string;
}

/**
 * Collect statements: inline expressions first, then the contents of every
 * file matched by the glob patterns, each file once, in sorted order.
 *
 * @throws UsageError if a pattern matches no file
 */
export async function loadStatements(
  config: Pick<CliConfig, 'expressions' | 'patterns'>,
  cwd: string
): Promise<StatementSource[]> {
  const sources: StatementSource[] = config.expressions.map((text, index) => ({
    label: `expr#${index + 1}`,
    text,
  }));

  const seen = new Set<string>();

  for (const pattern of config.patterns) {
    const files = await globby(pattern, { cwd, onlyFiles: true });
    if (files.length === 0) {
      throw new UsageError(`No files match "${pattern}"`);
    }

    for (const file of [...files].sort()) {
      if (seen.has(file)) continue;
      seen.add(file);

      const text = await readFile(resolve(cwd, file), 'utf8');
      sources.push({ label: file, text });
    }
  }

  return sources;
}
