/**
 * Configuration Loader
 *
 * Builds the PlannerConfig from defaults, data/planner-config.json overrides
 * and environment variables, and exposes provider credentials.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_PLANNER_CONFIG, PATHS } from './constants';
import {
  EnvironmentSchema,
  PlannerConfigOverridesSchema,
  PlannerConfigSchema,
  formatIssues,
  type Environment,
  type PlannerConfig,
} from './schema';

export interface ProviderCredentials {
  amadeus: { apiKey: string; apiSecret: string; testMode: boolean } | null;
  googlePlacesKey: string | null;
  openaiApiKey: string | null;
}

// Cached configs
let plannerConfigCache: { envKey: string; config: PlannerConfig } | null = null;
let projectRootCache: string | null = null;

/**
 * Get the project root directory.
 */
function getProjectRoot(): string {
  if (projectRootCache) return projectRootCache;
  // Walk up from current file to find package.json
  let dir = __dirname;
  while (dir !== path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, 'package.json'))) {
      projectRootCache = dir;
      return dir;
    }
    dir = path.dirname(dir);
  }
  // Fallback: assume we're in src/config
  projectRootCache = path.resolve(__dirname, '../..');
  return projectRootCache;
}

function resolveRepoPath(relPath: string, context: string): string {
  const root = getProjectRoot();
  if (path.isAbsolute(relPath)) {
    throw new Error(`${context}: path must be repo-relative, got absolute path: ${relPath}`);
  }
  const resolved = path.resolve(root, relPath);
  const relative = path.relative(root, resolved);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`${context}: path escapes project root: ${relPath}`);
  }
  return resolved;
}

function readJsonFile(relPath: string, context: string): unknown {
  const filePath = resolveRepoPath(relPath, context);
  if (!fs.existsSync(filePath)) return undefined;
  const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge plain objects; arrays and scalars in `override` replace.
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

/**
 * Parse environment variables the engine reads.
 */
export function parseEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Environment validation failed:\n${formatIssues(result.error).join('\n')}`);
  }
  return result.data;
}

function environmentOverrides(env: Environment): unknown {
  const ttl = env.CACHE_EXPIRATION;
  return {
    providers: {
      ...(env.PROVIDER_TIMEOUT_MS !== undefined && { timeoutMs: env.PROVIDER_TIMEOUT_MS }),
      ...(ttl !== undefined && {
        cacheTtlSeconds: { flight: ttl, lodging: ttl },
      }),
    },
    narration: {
      ...(env.NARRATION_TIMEOUT_MS !== undefined && { timeoutMs: env.NARRATION_TIMEOUT_MS }),
      ...(env.OPENAI_MODEL !== undefined && { model: env.OPENAI_MODEL }),
    },
  };
}

/**
 * Validate a config candidate with detailed error messages.
 */
export function validatePlannerConfig(data: unknown): PlannerConfig {
  const result = PlannerConfigSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Planner config validation failed:\n${formatIssues(result.error).join('\n')}`);
  }
  const { baseline } = result.data.budget;
  const baselineSum = baseline.flight + baseline.lodging + baseline.activity + baseline.meal;
  if (Math.abs(baselineSum - 1) > 1e-6) {
    throw new Error(`Planner config validation failed:\n  - budget.baseline: fractions must sum to 1 (got ${baselineSum})`);
  }
  return result.data;
}

/**
 * Load planner configuration: defaults, then the optional overrides file,
 * then environment variables. Cached per set of environment overrides; the
 * files are read once until clearConfigCache().
 */
export function loadPlannerConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const envOverrides = environmentOverrides(parseEnvironment(env));
  const envKey = JSON.stringify(envOverrides);
  if (plannerConfigCache?.envKey === envKey) return plannerConfigCache.config;

  const overrides = readJsonFile(PATHS.plannerConfig, 'Planner config');
  if (overrides !== undefined) {
    const parsed = PlannerConfigOverridesSchema.safeParse(overrides);
    if (!parsed.success) {
      throw new Error(`Planner config overrides invalid:\n${formatIssues(parsed.error).join('\n')}`);
    }
  }

  const placeTypeTags = readJsonFile(PATHS.placeTypeTags, 'Place type tags');
  const tagTable = z.record(z.string(), z.array(z.string())).safeParse(placeTypeTags ?? {});
  if (!tagTable.success) {
    throw new Error(`Place type tags invalid:\n${formatIssues(tagTable.error).join('\n')}`);
  }

  let merged = mergeConfig(DEFAULT_PLANNER_CONFIG, { providers: { placeTypeTags: tagTable.data } });
  merged = mergeConfig(merged, overrides);
  merged = mergeConfig(merged, envOverrides);

  const config = validatePlannerConfig(merged);
  plannerConfigCache = { envKey, config };
  return config;
}

/**
 * Credentials for the upstream capabilities. Missing keys disable the
 * matching provider rather than failing.
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): ProviderCredentials {
  const parsed = parseEnvironment(env);
  return {
    amadeus:
      parsed.AMADEUS_API_KEY && parsed.AMADEUS_API_SECRET
        ? {
            apiKey: parsed.AMADEUS_API_KEY,
            apiSecret: parsed.AMADEUS_API_SECRET,
            testMode: parsed.AMADEUS_TEST_MODE,
          }
        : null,
    googlePlacesKey: parsed.GOOGLE_PLACES_KEY || null,
    openaiApiKey: parsed.OPENAI_API_KEY || null,
  };
}

/**
 * Clear cached configurations (for testing).
 */
export function clearConfigCache(): void {
  plannerConfigCache = null;
  projectRootCache = null;
}
