import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { z } from 'zod';
import type { Codec } from './codecs/codec.js';
import { compactJsonCodec } from './codecs/json.js';
import { framedCodec, FRAMED_EXTENSION } from './codecs/framed.js';
import type { ValueSchema } from './codecs/codec.js';
import type { DirectoryKind } from './directory-kind.js';
import { DIRECTORY_KINDS, DEFAULT_DIRECTORY_KIND } from './directory-kind.js';
import type { DefinitionError, DefinitionIssue } from './errors.js';
import type { FileIdentity } from './file-naming.js';
import { deriveFileIdentity } from './file-naming.js';
import type { Frame } from './frame.js';
import { FRAME_LAYOUT, MAX_FRAME_VERSION } from './frame.js';
import { utf8ByteLength } from './lib/utf8.js';
import type { Brand } from '../runtime/brand.js';

// =============================================================================
// Limits
// =============================================================================

export const NAME_LIMITS = {
  /** project and file names, exclusive */
  MAX_NAME_BYTES: 255,
  /** each sub-directory segment, inclusive */
  MAX_SEGMENT_BYTES: 255,
  /** project + sub path + file, exclusive */
  MAX_TOTAL_BYTES: 4000,
  /** sub-directory depth, exclusive */
  MAX_SUB_DEPTH: 10,
} as const;

const FORBIDDEN_CHARACTERS = ['<', '>', ':', '"', "'", '|', '?', '*', '^', '$', '&', '(', ')', '\u0000'] as const;

const EXTENSION_PATTERN = /^[A-Za-z0-9]*$/;

const EDGE_CHARACTERS = [' ', '/', '\\'] as const;

const RESERVED_NAMES: ReadonlySet<string> = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9',
]);

// =============================================================================
// Types
// =============================================================================

export interface FileDefinitionInput<T> {
  readonly project: string;
  readonly file: string;
  /** `/`-separated sub-directories below the project directory. */
  readonly sub?: string;
  readonly dir?: DirectoryKind;
  /** Overrides the codec's extension. */
  readonly extension?: string;
  readonly codec: Codec<T>;
}

export interface BinaryFileDefinitionInput<T> {
  readonly project: string;
  readonly file: string;
  readonly sub?: string;
  readonly dir?: DirectoryKind;
  readonly extension?: string;
  /** Exactly 24 bytes. */
  readonly header: ArrayLike<number>;
  readonly version: number;
  /** Payload schema; framed compact JSON is used unless `payloadCodec` is given. */
  readonly schema: ValueSchema<T>;
  readonly payloadCodec?: Codec<T>;
}

export interface FileDefinitionFields<T> {
  readonly project: string;
  readonly sub: readonly string[];
  readonly file: string;
  readonly dir: DirectoryKind;
  readonly extension: string;
  readonly identity: FileIdentity;
  readonly codec: Codec<T>;
}

/**
 * A validated, immutable file definition. Only `defineFile` and
 * `defineBinaryFile` mint one; the engine also checks at run time that a
 * definition came from them before resolving any path.
 */
export type FileDefinition<T> = Brand<FileDefinitionFields<T>, 'FileDefinition'>;

export type BinaryFileDefinition<T> = FileDefinition<T> & { readonly frame: Frame };

export interface DefineOptions {
  /** Decides whether `\` also separates sub-directories. */
  readonly platform?: NodeJS.Platform;
}

// =============================================================================
// Schema (shape only; name rules run after)
// =============================================================================

const ShapeSchema = z.object({
  project: z.string({ required_error: 'project is required' }),
  file: z.string({ required_error: 'file is required' }),
  sub: z.string().default(''),
  dir: z.enum(DIRECTORY_KINDS).default(DEFAULT_DIRECTORY_KIND),
  extension: z
    .string()
    .regex(EXTENSION_PATTERN, 'extension must be alphanumeric')
    .optional(),
});

const FrameSchema = z.object({
  header: z
    .array(z.number().int().min(0, 'header bytes are 0-255').max(255, 'header bytes are 0-255'))
    .length(FRAME_LAYOUT.HEADER_SIZE, `header must be exactly ${FRAME_LAYOUT.HEADER_SIZE} bytes`),
  version: z
    .number()
    .int('version must be an integer')
    .min(0, `version must be 0-${MAX_FRAME_VERSION}`)
    .max(MAX_FRAME_VERSION, `version must be 0-${MAX_FRAME_VERSION}`),
});

// =============================================================================
// Public API
// =============================================================================

export function defineFile<T>(input: FileDefinitionInput<T>, options: DefineOptions = {}): Result<FileDefinition<T>, DefinitionError> {
  const shape = ShapeSchema.safeParse(input);
  if (!shape.success) return err(definitionInvalid(toIssues(shape.error)));

  const { project, file, sub, dir } = shape.data;
  const extension = shape.data.extension ?? input.codec.extension;
  const segments = splitSub(sub, options.platform ?? process.platform);

  const issues = checkNames(project, segments, file);
  if (!EXTENSION_PATTERN.test(extension)) {
    issues.push({ path: 'extension', message: `codec extension "${extension}" must be alphanumeric` });
  }
  if (issues.length > 0) return err(definitionInvalid(issues));

  return ok(
    mintFile({
      project,
      sub: Object.freeze(segments),
      file,
      dir,
      extension,
      identity: deriveFileIdentity(file, extension),
      codec: input.codec,
    })
  );
}

export function defineBinaryFile<T>(
  input: BinaryFileDefinitionInput<T>,
  options: DefineOptions = {}
): Result<BinaryFileDefinition<T>, DefinitionError> {
  const frameParsed = FrameSchema.safeParse({ header: Array.from(input.header), version: input.version });
  const frameIssues = frameParsed.success ? [] : toIssues(frameParsed.error);

  const frame: Frame | null = frameParsed.success
    ? Object.freeze({ header: Uint8Array.from(frameParsed.data.header), version: frameParsed.data.version })
    : null;

  const payload = input.payloadCodec ?? compactJsonCodec(input.schema);
  const base = defineFile(
    {
      project: input.project,
      file: input.file,
      sub: input.sub,
      dir: input.dir,
      extension: input.extension ?? FRAMED_EXTENSION,
      codec: payload,
    },
    options
  );

  const baseIssues = base.isErr() ? base.error.issues : [];
  if (base.isErr() || frame === null) return err(definitionInvalid([...baseIssues, ...frameIssues]));

  const { project, sub, file, dir, extension, identity } = base.value;
  return ok(
    mintBinary({
      project,
      sub,
      file,
      dir,
      extension,
      identity,
      codec: framedCodec(frame, payload, extension),
      frame,
    })
  );
}

/** True only for definitions returned by `defineFile` or `defineBinaryFile`. */
export function isIssuedDefinition(value: object): boolean {
  return issued.has(value);
}

// =============================================================================
// Internal
// =============================================================================

const issued = new WeakSet<object>();

function mintFile<T>(fields: FileDefinitionFields<T>): FileDefinition<T> {
  const definition = Object.freeze(fields);
  issued.add(definition);
  return definition as FileDefinition<T>;
}

function mintBinary<T>(fields: FileDefinitionFields<T> & { readonly frame: Frame }): BinaryFileDefinition<T> {
  const definition = Object.freeze(fields);
  issued.add(definition);
  return definition as BinaryFileDefinition<T>;
}

function definitionInvalid(issues: readonly DefinitionIssue[]): DefinitionError {
  return { code: 'DEFINITION_INVALID', issues, message: 'Invalid file definition' };
}

function toIssues(error: z.ZodError): readonly DefinitionIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

function splitSub(sub: string, platform: NodeJS.Platform): string[] {
  if (sub === '') return [];
  return sub.split(platform === 'win32' ? /[\\/]/ : '/');
}

function checkNames(project: string, sub: readonly string[], file: string): DefinitionIssue[] {
  const issues: DefinitionIssue[] = [
    ...checkTopLevelName('project', project),
    ...checkTopLevelName('file', file),
  ];

  if (sub.length >= NAME_LIMITS.MAX_SUB_DEPTH) {
    issues.push({ path: 'sub', message: `at most ${NAME_LIMITS.MAX_SUB_DEPTH - 1} sub-directories` });
  }
  sub.forEach((segment, i) => {
    const at = `sub[${i}]`;
    if (segment.length === 0) {
      issues.push({ path: at, message: 'empty sub-directory segment' });
      return;
    }
    if (utf8ByteLength(segment) > NAME_LIMITS.MAX_SEGMENT_BYTES) {
      issues.push({ path: at, message: `longer than ${NAME_LIMITS.MAX_SEGMENT_BYTES} bytes` });
    }
    issues.push(...checkComponent(at, segment));
  });

  const total = utf8ByteLength(project) + utf8ByteLength(sub.join('/')) + utf8ByteLength(file);
  if (total >= NAME_LIMITS.MAX_TOTAL_BYTES) {
    issues.push({ path: '(root)', message: `project, sub and file together must be under ${NAME_LIMITS.MAX_TOTAL_BYTES} bytes` });
  }

  return issues;
}

function checkTopLevelName(label: 'project' | 'file', value: string): DefinitionIssue[] {
  if (value.length === 0) return [{ path: label, message: `${label} must not be empty` }];

  const issues: DefinitionIssue[] = [];
  if (utf8ByteLength(value) >= NAME_LIMITS.MAX_NAME_BYTES) {
    issues.push({ path: label, message: `must be under ${NAME_LIMITS.MAX_NAME_BYTES} bytes` });
  }
  if (value.includes('/') || value.includes('\\')) {
    issues.push({ path: label, message: 'must not contain path separators' });
  }
  issues.push(...checkComponent(label, value));
  return issues;
}

function checkComponent(at: string, value: string): DefinitionIssue[] {
  const issues: DefinitionIssue[] = [];

  const forbidden = FORBIDDEN_CHARACTERS.filter((c) => value.includes(c));
  if (forbidden.length > 0) {
    issues.push({ path: at, message: `contains forbidden characters: ${forbidden.map(describeChar).join(' ')}` });
  }

  for (const edge of EDGE_CHARACTERS) {
    if (value.startsWith(edge) || value.endsWith(edge)) {
      issues.push({ path: at, message: `must not start or end with ${describeChar(edge)}` });
    }
  }

  if (value === '.' || value === '..') {
    issues.push({ path: at, message: `"${value}" is not a usable name` });
  }

  const stem = value.split('.')[0]?.toUpperCase() ?? '';
  if (RESERVED_NAMES.has(stem)) {
    issues.push({ path: at, message: `"${value}" is a reserved device name` });
  }

  return issues;
}

function describeChar(c: string): string {
  if (c === '\u0000') return 'NUL';
  if (c === ' ') return 'space';
  return `'${c}'`;
}
