import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_ORG = 'opploans';

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string({ required_error: 'is required' }).trim().min(1, 'must not be empty'),
  GITHUB_ORG: z.string().trim().min(1).default(DEFAULT_ORG),
  GITHUB_API_URL: z.string().trim().url('must be a URL').default(DEFAULT_API_URL),
});

export type Config = {
  token: string;
  org: string;
  apiUrl: string;
};

/** Reads and validates the environment once; throws ConfigError listing every problem. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)));
  }
  const { GITHUB_TOKEN, GITHUB_ORG, GITHUB_API_URL } = parsed.data;
  return { token: GITHUB_TOKEN, org: GITHUB_ORG, apiUrl: GITHUB_API_URL.replace(/\/+$/, '') };
}
