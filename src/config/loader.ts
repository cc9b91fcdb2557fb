import { lilconfig } from 'lilconfig';
import { auditConfigSchema, type AuditConfigResolved } from './schema.js';

const explorer = lilconfig('hidden-text-audit', {
  searchPlaces: [
    'hidden-text-audit.config.js',
    'hidden-text-audit.config.mjs',
    '.hidden-text-auditrc.json',
    'package.json',
  ],
});

/** A config file that does not satisfy the schema */
export class ConfigError extends Error {
  /** Undefined when the defaults themselves were rejected */
  readonly filePath: string | undefined;

  constructor(message: string, filePath: string | undefined, options?: { cause?: unknown }) {
    super(filePath ? `${filePath}: ${message}` : message, options);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

/**
 * Loads the config from an explicit path, or searches upward from cwd.
 * No config file means all defaults.
 */
export async function loadConfig(
  explicitPath?: string
): Promise<AuditConfigResolved> {
  const result = explicitPath
    ? await explorer.load(explicitPath)
    : await explorer.search();

  const raw: unknown = result?.config ?? {};
  const parsed = auditConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(
      `invalid config (${where}${issue?.message ?? 'unknown error'})`,
      result?.filepath,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
