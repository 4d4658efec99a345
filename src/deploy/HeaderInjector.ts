/**
 * Provenance headers for deployed files.
 *
 * The header is a "DO NOT EDIT" banner followed by the source URL, the commit
 * (or archive hash) and the deploy time, wrapped in the comment syntax of the
 * destination's extension. It is written to a copy of the source; the source
 * itself is never touched.
 */

import * as fs from 'fs/promises';
import { getLogger, registerComponent } from '../logging/index.js';
import { formatLocalDateTime } from '../util/DateFormat.js';
import { withSuffix } from './PathResolver.js';
import type { ResolvedPath } from './types.js';

registerComponent('deploy.header', 'Provenance header injection');
const logger = getLogger('deploy.header');

export const HEADER_WIDTH = 55;

// figlet "DO NOT EDIT"
const BANNER: readonly string[] = [
  ' ____   ___    _   _  ___ _____   _____ ____ ___ _____ ',
  '|  _ \\ / _ \\  | \\ | |/ _ \\_   _| | ____|  _ \\_ _|_   _|',
  '| | | | | | | |  \\| | | | || |   |  _| | | | | |  | |  ',
  '| |_| | |_| | | |\\  | |_| || |   | |___| |_| | |  | |  ',
  '|____/ \\___/  |_| \\_|\\___/ |_|   |_____|____/___| |_|  ',
];

const TRAILING_BLANKS = '\n\n\n';

export interface CommentStyle {
  /** Written once before the header lines. */
  preBlock: string;
  /** Written once after the header lines, before the original content. */
  postBlock: string;
  /** Prefix and suffix of every header line. */
  preLine: string;
  postLine: string;
}

const C_STYLE: CommentStyle = { preBlock: '/*\n', postBlock: '*/\n' + TRAILING_BLANKS, preLine: '', postLine: '' };
const MARKUP_STYLE: CommentStyle = { preBlock: '<!--\n', postBlock: '-->\n' + TRAILING_BLANKS, preLine: '', postLine: '' };
const HASH_STYLE: CommentStyle = { preBlock: '', postBlock: TRAILING_BLANKS, preLine: '# ', postLine: ' #' };
// nothing may sit outside the php tags, not even a newline
const PHP_STYLE: CommentStyle = { preBlock: '<?php /*\n', postBlock: '*/\n' + TRAILING_BLANKS + '?>', preLine: '', postLine: '' };

const STYLES_BY_EXTENSION: ReadonlyMap<string, CommentStyle> = new Map([
  ...['js', 'min.js', 'css', 'c', 'cpp', 'h', 'hpp', 'java'].map((ext): [string, CommentStyle] => [ext, C_STYLE]),
  ...['html', 'xml'].map((ext): [string, CommentStyle] => [ext, MARKUP_STYLE]),
  ...['py', 'r', 'coffee', 'htaccess'].map((ext): [string, CommentStyle] => [ext, HASH_STYLE]),
  ['php', PHP_STYLE],
]);

/**
 * Comment syntax for a destination extension (case-insensitive), or null when unsupported.
 */
export function selectCommentStyle(extension: string): CommentStyle | null {
  return STYLES_BY_EXTENSION.get(extension.toLowerCase()) ?? null;
}

/**
 * Center `text` in the banner width. Text at or over the width is returned as is.
 */
export function layoutHeaderLine(text: string): string {
  const padding = HEADER_WIDTH - text.length;
  if (padding <= 0) return text;
  const left = Math.floor(padding / 2);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}

export function buildHeader(style: CommentStyle, provenanceUrl: string, commit: string, deployedAt: Date): string {
  const epochSeconds = Math.round(deployedAt.getTime() / 1000);
  const roundedTime = new Date(epochSeconds * 1000);
  const details = [
    '',
    'Automatically generated from sources at:',
    provenanceUrl,
    '',
    `Commit hash: ${commit}`,
    `Deployed at: ${formatLocalDateTime(roundedTime)} (${epochSeconds})`,
  ];

  const body = [...BANNER, ...details]
    .map((line) => style.preLine + layoutHeaderLine(line) + style.postLine + '\n')
    .join('');
  return style.preBlock + body + style.postBlock;
}

/**
 * Write `<source>__header` with the provenance header prepended and return it.
 * Returns `source` unchanged when the destination extension has no comment syntax.
 */
export async function addHeader(
  provenanceUrl: string,
  commit: string,
  source: ResolvedPath,
  destinationExtension: string,
  now: Date = new Date()
): Promise<ResolvedPath> {
  const style = selectCommentStyle(destinationExtension);
  if (!style) {
    logger.warn(` skipped header for file extension [${destinationExtension}]`);
    return source;
  }

  const target = withSuffix(source, '__header');
  logger.info(` adding header [${source.absolutePath}] -> [${target.absolutePath}]`);

  const original = await fs.readFile(source.absolutePath);
  const header = Buffer.from(buildHeader(style, provenanceUrl, commit, now), 'utf-8');
  await fs.writeFile(target.absolutePath, Buffer.concat([header, original]));
  return target;
}
