import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';

export const DEFAULT_CONFIG_FILE = 'postpress.config.json';

const navItemSchema = z.object({
  label: z.string().min(1),
  href: z.string().min(1),
});

export const SiteConfigSchema = z.object({
  siteName: z.string().min(1).default('postpress'),
  description: z.string().default('Notes and tutorials.'),
  // Prefix for every generated href, always ends with '/'
  basePath: z
    .string()
    .default('/')
    .transform(value => (value.endsWith('/') ? value : `${value}/`)),
  // Absolute origin used for canonical URLs, e.g. https://example.com
  siteUrl: z.string().url().optional(),
  contentDir: z.string().default('content/posts'),
  outDir: z.string().default('out'),
  publicDir: z.string().default('public'),
  includeDrafts: z.boolean().default(false),
  sanitize: z.boolean().default(false),
  clean: z.boolean().default(false),
  nav: z.array(navItemSchema).optional(),
});

export type SiteConfigInput = z.input<typeof SiteConfigSchema>;
export type SiteConfig = z.output<typeof SiteConfigSchema>;

/**
 * Validates a raw config object. Relative directories are resolved against `rootDir`.
 */
export function parseSiteConfig(input: unknown, rootDir: string = process.cwd(), source?: string): SiteConfig {
  const parsed = SiteConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`invalid site configuration (${issues.join('; ')})`, source);
  }

  const config = parsed.data;
  return {
    ...config,
    contentDir: path.resolve(rootDir, config.contentDir),
    outDir: path.resolve(rootDir, config.outDir),
    publicDir: path.resolve(rootDir, config.publicDir),
  };
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown> | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw new ConfigError('cannot read configuration file', filePath, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError('configuration file is not valid JSON', filePath, { cause: err });
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError('configuration file must contain a JSON object', filePath);
  }
  return Object.fromEntries(Object.entries(data));
}

/**
 * Loads `postpress.config.json` (or `configPath`) and applies `overrides` on top.
 * A missing default config file is fine; a missing explicit one is not.
 * Directories in the file resolve against the file's directory, overrides against the cwd.
 */
export async function loadSiteConfig(
  overrides: Partial<SiteConfigInput> = {},
  configPath?: string,
  cwd: string = process.cwd(),
): Promise<SiteConfig> {
  const filePath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
  const fileConfig = await readConfigFile(filePath);
  if (!fileConfig && configPath) {
    throw new ConfigError('configuration file not found', filePath);
  }

  const rootDir = fileConfig ? path.dirname(filePath) : cwd;
  // undefined means "not given" and must not mask a value from the file
  const resolvedOverrides = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  for (const key of ['contentDir', 'outDir', 'publicDir'] as const) {
    const value = overrides[key];
    if (value !== undefined) resolvedOverrides[key] = path.resolve(cwd, value);
  }

  return parseSiteConfig({ ...fileConfig, ...resolvedOverrides }, rootDir, fileConfig ? filePath : undefined);
}
