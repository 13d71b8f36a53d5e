/**
 * Map RECONCILER_* environment variables onto configuration overrides.
 * Unset variables stay undefined and take the schema default. Numbers are handed to
 * createReconcilerConfig unchecked, so a malformed one surfaces there as a
 * ConfigurationError naming the config path.
 */
import {
  ConfigurationError,
  createReconcilerConfig,
  type ReconcilerConfig,
  type ReconcilerConfigOverrides,
} from '@reconciler/core';

type Env = Record<string, string | undefined>;

function num(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  return raw ? Number(raw) : undefined;
}

function bool(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigurationError([`${name}: expected a boolean, got "${raw}"`]);
}

function clustering(env: Env): 'transitive' | 'complete' | undefined {
  const raw = env.RECONCILER_CLUSTERING?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === 'transitive' || raw === 'complete') return raw;
  throw new ConfigurationError([
    `RECONCILER_CLUSTERING: expected "transitive" or "complete", got "${raw}"`,
  ]);
}

export function configOverridesFromEnv(env: Env = process.env): ReconcilerConfigOverrides {
  return {
    similarity: {
      contentWeight: num(env, 'RECONCILER_CONTENT_WEIGHT'),
      locationWeight: num(env, 'RECONCILER_LOCATION_WEIGHT'),
      salaryWeight: num(env, 'RECONCILER_SALARY_WEIGHT'),
      partialCredit: num(env, 'RECONCILER_PARTIAL_CREDIT'),
    },
    duplicates: {
      threshold: num(env, 'RECONCILER_DUPLICATE_THRESHOLD'),
      gatingWindowDays: num(env, 'RECONCILER_GATING_WINDOW_DAYS'),
      clustering: clustering(env),
      linkByRequisitionId: bool(env, 'RECONCILER_LINK_BY_REQUISITION'),
      linkByUrl: bool(env, 'RECONCILER_LINK_BY_URL'),
    },
    deltaBands: {
      identical: num(env, 'RECONCILER_BAND_IDENTICAL'),
      minorDifferences: num(env, 'RECONCILER_BAND_MINOR'),
      contentDrift: num(env, 'RECONCILER_BAND_DRIFT'),
      majorDiscrepancy: num(env, 'RECONCILER_BAND_MAJOR'),
    },
    companyScore: {
      outdatedFractionThreshold: num(env, 'RECONCILER_OUTDATED_FRACTION_THRESHOLD'),
      poorSyncFloor: num(env, 'RECONCILER_POOR_SYNC_FLOOR'),
    },
    defaultPlatformReliability: num(env, 'RECONCILER_DEFAULT_PLATFORM_RELIABILITY'),
  };
}

export function configFromEnv(env: Env = process.env): ReconcilerConfig {
  return createReconcilerConfig(configOverridesFromEnv(env));
}
