/**
 * Parsing and validation of the instruction document (deploy.json) and its action rows.
 *
 * The document is checked as a whole up front. Action rows are parsed one at a
 * time as execution reaches them, so a malformed row late in the list only
 * fails once everything before it has run.
 */

import { z } from 'zod';
import { InvalidActionError, InvalidConfigError, errorMessage } from './errors.js';
import { ACTION_TYPES } from './types.js';
import type { ActionType, DeployAction, InstructionDocument } from './types.js';

export const DOCUMENT_TYPE = 'delphi deploy config';
export const MIN_VERSION = 1;
export const MAX_VERSION = 1;

// Key order is the order fields are reported in when several are wrong.
const InstructionDocumentSchema = z.object({
  type: z.literal(DOCUMENT_TYPE),
  version: z.number().int().min(MIN_VERSION).max(MAX_VERSION),
  actions: z.array(z.unknown()),
  skip: z.unknown().optional(),
});

// Only read once the document is known not to be skipped.
const PathsSchema = z.object({
  paths: z.record(z.string()).optional(),
});

function invalidField(error: z.ZodError, fallback: string): InvalidConfigError {
  const field = error.issues[0]?.path[0] ?? fallback;
  return new InvalidConfigError(`missing or invalid deploy config \`${String(field)}\``, { cause: error });
}

export function parseInstructionDocument(text: string): InstructionDocument {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new InvalidConfigError(`unable to parse deploy config file: ${errorMessage(error)}`, { cause: error });
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new InvalidConfigError('unable to load deploy config file');
  }

  const parsed = InstructionDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throw invalidField(parsed.error, 'type');
  }

  const { type, version, actions } = parsed.data;
  if (parsed.data.skip === true) {
    return { type, version, skip: true, substitutions: {}, actions };
  }

  const paths = PathsSchema.safeParse(data);
  if (!paths.success) {
    throw invalidField(paths.error, 'paths');
  }

  return { type, version, skip: false, substitutions: paths.data.paths ?? {}, actions };
}

// ============================================================================
// Action rows
// ============================================================================

const flag = z.unknown().transform((value) => value === true);

// Values that are neither a name nor a list of names are ignored.
const templateList = z
  .union([z.string(), z.array(z.string()), z.unknown().refine((value) => !Array.isArray(value))])
  .transform((value): string[] => {
    if (typeof value === 'string') return [value];
    if (Array.isArray(value)) return value.filter((name): name is string => typeof name === 'string');
    return [];
  });

const CopyFields = z.object({
  src: z.string(),
  dst: z.string(),
  match: z.string().optional(),
  'add-header-comment': flag,
  'replace-keywords': templateList,
});

const TransformFields = z.object({
  src: z.string(),
  dst: z.string().optional(),
});

const ExportFields = z.object({
  src: z.string(),
  name: z.string().optional(),
  'add-header-comment': flag,
  'replace-keywords': templateList,
});

const ImportFields = z.object({
  dst: z.string(),
  name: z.string().optional(),
});

function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((type) => type === value);
}

function parseFields<T extends z.ZodTypeAny>(
  schema: T,
  row: Record<string, unknown>,
  type: ActionType,
  position: number,
  total: number
): z.output<T> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'row';
    throw new InvalidActionError(
      `invalid ${type} action (${position}/${total}): field \`${field}\` ${issue?.message ?? 'is invalid'}`,
      position,
      total,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Parse the row at zero-based `index` of `total` rows.
 * Returns null for comment rows (plain strings).
 */
export function parseActionRow(row: unknown, index: number, total: number): DeployAction | null {
  const position = index + 1;

  if (typeof row === 'string') {
    return null;
  }
  if (typeof row !== 'object' || row === null || Array.isArray(row) || !('type' in row) || typeof row.type !== 'string') {
    throw new InvalidActionError(`invalid action (${position}/${total})`, position, total);
  }

  const fields: Record<string, unknown> = { ...row };
  const type = row.type.toLowerCase();
  if (!isActionType(type)) {
    throw new InvalidActionError(`unsupported action: ${type}`, position, total);
  }

  switch (type) {
    case 'copy':
    case 'move': {
      const f = parseFields(CopyFields, fields, type, position, total);
      return {
        type,
        src: f.src,
        dst: f.dst,
        match: f.match,
        addHeaderComment: f['add-header-comment'],
        replaceKeywords: f['replace-keywords'],
      };
    }
    case 'compile-coffee': {
      const f = parseFields(TransformFields, fields, type, position, total);
      return { type, src: f.src, dst: f.dst };
    }
    case 'minimize-js': {
      const f = parseFields(TransformFields, fields, type, position, total);
      return { type, src: f.src, dst: f.dst };
    }
    case 'export': {
      const f = parseFields(ExportFields, fields, type, position, total);
      return {
        type,
        src: f.src,
        name: f.name,
        addHeaderComment: f['add-header-comment'],
        replaceKeywords: f['replace-keywords'],
      };
    }
    case 'import': {
      const f = parseFields(ImportFields, fields, type, position, total);
      return { type, dst: f.dst, name: f.name };
    }
    default: {
      const unreachable: never = type;
      throw new InvalidActionError(`unsupported action: ${String(unreachable)}`, position, total);
    }
  }
}
