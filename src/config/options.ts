/**
 * Run configuration
 *
 * Command-line flags win; credentials may also come from the environment
 * (or a .env file in the working directory).
 */

import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { DEFAULT_PAGE_SIZE, DEFAULT_REGION } from '../locate/folderLocator.js';

/**
 * Flags as commander hands them over
 */
export interface RawFlags {
  client_id?: string;
  client_secret?: string;
  tenant_id?: string;
  folder_name?: string;
  web_url?: string;
  download_path?: string;
  region?: string;
  page_size?: string;
  match?: string;
  on_error?: string;
  verbose?: boolean;
  quiet?: boolean;
}

const required = (hint: string) =>
  z.string({ required_error: `is required${hint}` }).trim().min(1, `is required${hint}`);

const OptionsSchema = z.object({
  clientId: required(' (or set AZURE_CLIENT_ID)'),
  clientSecret: required(' (or set AZURE_CLIENT_SECRET)'),
  tenantId: required(' (or set AZURE_TENANT_ID)'),
  folderName: required(''),
  webUrl: required(''),
  downloadPath: z.string().min(1),
  region: z.string().trim().min(1, 'must not be empty'),
  pageSize: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .min(1, 'must be between 1 and 500')
    .max(500, 'must be between 1 and 500'),
  matchPolicy: z.enum(['first', 'last', 'unique'], {
    errorMap: () => ({ message: 'must be one of first, last, unique' }),
  }),
  onError: z.enum(['abort', 'continue'], {
    errorMap: () => ({ message: 'must be one of abort, continue' }),
  }),
  verbose: z.boolean(),
  quiet: z.boolean(),
});

export type ResolvedOptions = z.infer<typeof OptionsSchema>;

const FLAG_NAMES: Record<keyof ResolvedOptions, string> = {
  clientId: '--client_id',
  clientSecret: '--client_secret',
  tenantId: '--tenant_id',
  folderName: '--folder_name',
  webUrl: '--web_url',
  downloadPath: '--download_path',
  region: '--region',
  pageSize: '--page_size',
  matchPolicy: '--match',
  onError: '--on_error',
  verbose: '--verbose',
  quiet: '--quiet',
};

function isOptionKey(key: unknown): key is keyof ResolvedOptions {
  return typeof key === 'string' && key in FLAG_NAMES;
}

/**
 * Load `.env` from the working directory into process.env. Variables that
 * are already set are left alone; a missing file is fine.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.join(cwd, '.env') });
}

/**
 * Merge flags with the environment and validate. Throws ConfigError listing
 * every invalid option.
 */
export function resolveOptions(
  flags: RawFlags,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ResolvedOptions {
  const parsed = OptionsSchema.safeParse({
    clientId: flags.client_id ?? env.AZURE_CLIENT_ID,
    clientSecret: flags.client_secret ?? env.AZURE_CLIENT_SECRET,
    tenantId: flags.tenant_id ?? env.AZURE_TENANT_ID,
    folderName: flags.folder_name,
    webUrl: flags.web_url,
    downloadPath: path.resolve(cwd, flags.download_path ?? '.'),
    region: flags.region ?? DEFAULT_REGION,
    pageSize: flags.page_size ?? DEFAULT_PAGE_SIZE,
    matchPolicy: flags.match ?? 'first',
    onError: flags.on_error ?? 'abort',
    verbose: flags.verbose ?? false,
    quiet: flags.quiet ?? false,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const key = issue.path[0];
      const flag = isOptionKey(key) ? FLAG_NAMES[key] : issue.path.join('.');
      return `${flag} ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  return parsed.data;
}
