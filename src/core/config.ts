import { z } from 'zod';

/**
 * Runtime configuration, read from the environment once per run.
 * CLI flags override these values.
 */

export const DEFAULT_CONTACT_EMAIL = 'user@example.com';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const USER_AGENT_PRODUCT = 'edgar-filings-downloader';

const envSchema = z.object({
  // Checked by parseContactEmail only when it is used; -e replaces it
  SEC_CONTACT_EMAIL: z.string().trim().default(DEFAULT_CONTACT_EMAIL),
  SEC_USER_AGENT: z.string().trim().min(1).optional(),
  SEC_DOWNLOAD_DIR: z.string().trim().min(1).optional(),
  SEC_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export interface AppConfig {
  contactEmail: string;
  userAgent: string | null;
  downloadDir: string;
  requestTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  return {
    contactEmail: parsed.data.SEC_CONTACT_EMAIL,
    userAgent: parsed.data.SEC_USER_AGENT ?? null,
    downloadDir: parsed.data.SEC_DOWNLOAD_DIR ?? cwd,
    requestTimeoutMs: parsed.data.SEC_REQUEST_TIMEOUT_MS,
  };
}

/** Check the contact email that goes into the User-Agent. */
export function parseContactEmail(value: string): string {
  const result = z.string().trim().email().safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid contact email: "${value}"`);
  }
  return result.data;
}

/**
 * SEC asks automated clients to identify themselves with a contact address.
 * An explicit SEC_USER_AGENT wins over the generated one.
 */
export function buildUserAgent(contactEmail: string, override: string | null = null): string {
  return override ?? `${USER_AGENT_PRODUCT} ${contactEmail}`;
}
