// =============================================================================
// Engine Configuration
// Limits and feature flags, validated with zod and optionally read from env
// =============================================================================

import { z } from 'zod';
import { ConfigurationError } from './engine/errors';

const limit = (defaultValue: number) => z.number().int().positive().default(defaultValue);

export const engineConfigSchema = z.object({
  maxFormulaLength: limit(5000),
  maxVariables: limit(100),
  maxParsingDepth: limit(256),
  maxParsingSteps: limit(50000),
  maxStackDepth: limit(512),
  maxTokenCount: limit(2000),
  maxEvaluationDepth: limit(256),
  maxFormulaSteps: limit(50),
  maxCacheEntries: limit(256),
  strictMode: z.boolean().default(false),
  enableOptimization: z.boolean().default(false),
  enableCaching: z.boolean().default(false),
}).strict();

export type EngineConfig = Readonly<z.infer<typeof engineConfigSchema>>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

type NumericKey = {
  [K in keyof EngineConfig]: EngineConfig[K] extends number ? K : never;
}[keyof EngineConfig];
type FlagKey = Exclude<keyof EngineConfig, NumericKey>;

const NUMERIC_ENV: Record<NumericKey, string> = {
  maxFormulaLength: 'FORMULA_MAX_LENGTH',
  maxVariables: 'FORMULA_MAX_VARIABLES',
  maxParsingDepth: 'FORMULA_MAX_PARSING_DEPTH',
  maxParsingSteps: 'FORMULA_MAX_PARSING_STEPS',
  maxStackDepth: 'FORMULA_MAX_STACK_DEPTH',
  maxTokenCount: 'FORMULA_MAX_TOKEN_COUNT',
  maxEvaluationDepth: 'FORMULA_MAX_EVALUATION_DEPTH',
  maxFormulaSteps: 'FORMULA_MAX_STEPS',
  maxCacheEntries: 'FORMULA_MAX_CACHE_ENTRIES',
};

const FLAG_ENV: Record<FlagKey, string> = {
  strictMode: 'FORMULA_STRICT_MODE',
  enableOptimization: 'FORMULA_ENABLE_OPTIMIZATION',
  enableCaching: 'FORMULA_ENABLE_CACHING',
};

/**
 * Validate a partial configuration and fill in defaults.
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return validateConfig(input);
}

function validateConfig(input: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid engine configuration: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { details: { issues } },
    );
  }
  return Object.freeze(parsed.data);
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = resolveEngineConfig();

/**
 * Build a configuration from FORMULA_* environment variables. Explicit
 * overrides win over the environment.
 */
export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EngineConfigInput = {},
): EngineConfig {
  const fromEnv: Record<string, unknown> = {};

  for (const [key, name] of Object.entries(NUMERIC_ENV)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw.trim());
    if (!Number.isInteger(value)) {
      throw new ConfigurationError(`${name} must be an integer, got "${raw}"`, {
        details: { variable: name, value: raw },
      });
    }
    fromEnv[key] = value;
  }

  for (const [key, name] of Object.entries(FLAG_ENV)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    fromEnv[key] = parseFlag(name, raw);
  }

  return validateConfig({ ...fromEnv, ...overrides });
}

function parseFlag(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`, {
        details: { variable: name, value: raw },
      });
  }
}
