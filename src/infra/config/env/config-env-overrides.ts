/**
 * Environment variable overrides for .port-usage/config.yaml.
 *
 * Each dotted config path maps to PORT_USAGE_<PATH> (e.g. `debug.enabled`
 * → PORT_USAGE_DEBUG_ENABLED). Values are parsed according to the declared type.
 */

type EnvValueType = 'string' | 'boolean';

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

const ENV_PREFIX = 'PORT_USAGE';

function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `${ENV_PREFIX}_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): string | boolean {
  if (type === 'string') {
    return raw;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new Error(`${envKey} must be one of: true, false`);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const leaf = parts.pop();
  if (!leaf) return;

  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = value;
}

const CONFIG_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'log_level', type: 'string' },
  { path: 'quiet', type: 'boolean' },
  { path: 'wrap_output', type: 'boolean' },
  { path: 'include_description', type: 'boolean' },
  { path: 'dedupe_targets', type: 'boolean' },
  { path: 'temp_dir', type: 'string' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
];

/**
 * Apply PORT_USAGE_* variables from `env` onto a raw (snake_case) config object.
 *
 * @throws when a variable holds a value of the wrong type
 */
export function applyConfigEnvOverrides(
  target: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): void {
  for (const spec of CONFIG_ENV_SPECS) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = env[envKey];
    if (raw === undefined) continue;
    setNested(target, spec.path, parseEnvValue(envKey, raw, spec.type));
  }
}
