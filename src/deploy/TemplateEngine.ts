/**
 * Keyword templating for `replace-keywords`.
 *
 * A template file is a JSON array of [key, value] string pairs. Pairs from all
 * templates are applied in order to every line of the source, each as a
 * literal replace-all, so a later pair sees the output of earlier ones.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { getLogger, registerComponent } from '../logging/index.js';
import { InvalidConfigError, errorMessage } from './errors.js';
import { withSuffix } from './PathResolver.js';
import type { ResolvedPath } from './types.js';

registerComponent('deploy.templates', 'Keyword replacement');
const logger = getLogger('deploy.templates');

export type KeywordPair = readonly [key: string, value: string];

const TemplateFileSchema = z.array(z.tuple([z.string(), z.string()]));

export async function loadTemplatePairs(templates: readonly ResolvedPath[]): Promise<KeywordPair[]> {
  const pairs: KeywordPair[] = [];
  for (const template of templates) {
    const text = await fs.readFile(template.absolutePath, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new InvalidConfigError(`template [${template.absolutePath}] is not valid JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const parsed = TemplateFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidConfigError(
        `template [${template.absolutePath}] must be a list of [key, value] string pairs`,
        { cause: parsed.error }
      );
    }
    pairs.push(...parsed.data);
  }
  return pairs;
}

/**
 * Split text into lines, each keeping its terminating newline.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  return text.split(/(?<=\n)/);
}

export function applyKeywords(text: string, pairs: readonly KeywordPair[]): string {
  return splitLines(text)
    .map((line) => {
      let replaced = line;
      for (const [key, value] of pairs) {
        replaced = replaced.split(key).join(value);
      }
      return replaced;
    })
    .join('');
}

/**
 * Write `<source>__valued` with every template pair applied and return it.
 */
export async function replaceKeywords(source: ResolvedPath, templates: readonly ResolvedPath[]): Promise<ResolvedPath> {
  const pairs = (await loadTemplatePairs(templates)).filter(([key]) => key.length > 0);
  const target = withSuffix(source, '__valued');
  logger.info(` replacing ${pairs.length} keywords [${source.absolutePath}] -> [${target.absolutePath}]`);

  const text = await fs.readFile(source.absolutePath, 'utf-8');
  await fs.writeFile(target.absolutePath, applyKeywords(text, pairs), 'utf-8');
  return target;
}
