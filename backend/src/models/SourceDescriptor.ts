import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../utils/errors';
import { isValidRepo, isValidSourceName } from '../utils/validation';

export const REVISION_PLACEHOLDER = '${revision}';
export const DEFAULT_FETCH_DIR = './tmpfw';

export const SOURCE_KINDS = ['remote-release', 'local-path', 'build-from-source'] as const;
export type SourceKind = typeof SOURCE_KINDS[number];

// Older configuration files name the kind with a `type` key.
const LEGACY_KINDS: Record<string, SourceKind> = {
  github: 'remote-release',
  local: 'local-path',
  platformio: 'build-from-source',
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds the matcher for one release: every `${revision}` in the pattern is
 * replaced by the literal release tag, the rest is a regular expression.
 */
export function compileAssetPattern(pattern: string, revision: string): RegExp {
  return new RegExp(pattern.split(REVISION_PLACEHOLDER).join(escapeRegExp(revision)));
}

function checkAssetPattern(pattern: string, ctx: z.RefinementCtx): void {
  if (!pattern.includes(REVISION_PLACEHOLDER)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must contain the ${REVISION_PLACEHOLDER} placeholder` });
    return;
  }
  try {
    compileAssetPattern(pattern, 'v0.0.0');
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `is not a valid pattern (${errorMessage(err)})` });
  }
}

const commonFields = {
  name: z.string().refine(isValidSourceName, 'must contain only letters, digits, ".", "_" or "-"'),
  platform: z.string().min(1).default('unknown'),
  description: z.string().optional(),
};

export const RemoteReleaseSchema = z.object({
  ...commonFields,
  kind: z.literal('remote-release'),
  repo: z.string().refine(isValidRepo, 'must look like "owner/name"'),
  asset: z.string().min(1).superRefine(checkAssetPattern),
  prerelease: z.boolean().default(false),
}).strict();

export const LocalPathSchema = z.object({
  ...commonFields,
  kind: z.literal('local-path'),
  path: z.string().min(1),
}).strict();

export const BuildFromSourceSchema = z.object({
  ...commonFields,
  kind: z.literal('build-from-source'),
  project: z.string().min(1),
  environment: z.string().min(1).optional(),
  artifact: z.string().min(1).optional(),
  board: z.string().optional(),
  framework: z.string().optional(),
}).strict();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeLegacyKind(raw: unknown): unknown {
  if (!isRecord(raw) || 'kind' in raw || typeof raw.type !== 'string') return raw;
  const { type, ...rest } = raw;
  return { ...rest, kind: LEGACY_KINDS[type] ?? type };
}

export const SourceDescriptorSchema = z.preprocess(
  normalizeLegacyKind,
  z.discriminatedUnion('kind', [RemoteReleaseSchema, LocalPathSchema, BuildFromSourceSchema]),
);

export const SourcesConfigSchema = z.object({
  fetchdir: z.string().min(1).default(DEFAULT_FETCH_DIR),
  sources: z.array(SourceDescriptorSchema),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.sources.forEach((source, index) => {
    if (seen.has(source.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sources', index, 'name'],
        message: `duplicate source name '${source.name}'`,
      });
    }
    seen.add(source.name);
  });
});

export type RemoteReleaseDescriptor = z.infer<typeof RemoteReleaseSchema>;
export type LocalPathDescriptor = z.infer<typeof LocalPathSchema>;
export type BuildFromSourceDescriptor = z.infer<typeof BuildFromSourceSchema>;
export type SourceDescriptor = RemoteReleaseDescriptor | LocalPathDescriptor | BuildFromSourceDescriptor;
export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

export function parseSourcesConfig(text: string): SourcesConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    throw new ConfigError('Sources configuration is not well-formed', [errorMessage(err)]);
  }

  if (!isRecord(document)) {
    throw new ConfigError('Sources configuration must be a mapping with "fetchdir" and "sources"');
  }

  const result = SourcesConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError('Invalid sources configuration', result.error.issues.map(formatIssue));
  }
  return result.data;
}

export function describeSource(descriptor: SourceDescriptor): string {
  if (descriptor.description) return descriptor.description;
  switch (descriptor.kind) {
    case 'remote-release':
      return `GitHub: ${descriptor.repo}`;
    case 'local-path':
      return `Local: ${descriptor.path}`;
    case 'build-from-source':
      return `PlatformIO: ${descriptor.project}`;
  }
}
