/**
 * CLI configuration, resolved from the environment with defaults.
 * Colour is left to chalk, which reads NO_COLOR / FORCE_COLOR itself.
 */

export interface CliConfig {
  /** Indentation of emitted JSON; 0 writes compact single-line JSON. */
  readonly jsonIndent: number;
}

export const DEFAULT_JSON_INDENT = 2;
const MAX_JSON_INDENT = 8;

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): { config: CliConfig; warnings: string[] } {
  const warnings: string[] = [];
  let jsonIndent = DEFAULT_JSON_INDENT;

  const raw = env['TASKWIRE_JSON_INDENT'];
  if (raw !== undefined && raw.trim() !== '') {
    const parsed = Number(raw);
    if (Number.isInteger(parsed) && parsed >= 0 && parsed <= MAX_JSON_INDENT) {
      jsonIndent = parsed;
    } else {
      warnings.push(`Ignoring TASKWIRE_JSON_INDENT=${raw}: expected an integer from 0 to ${MAX_JSON_INDENT}`);
    }
  }

  return { config: { jsonIndent }, warnings };
}

/** `--compact` on the command line wins over the environment. */
export function withCompact(config: CliConfig, compact: boolean | undefined): CliConfig {
  return compact ? { ...config, jsonIndent: 0 } : config;
}
