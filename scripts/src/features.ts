/**
 * esprun - Feature Flags
 *
 * User-space feature tokens are either `feature` (every module) or
 * `module:feature` (only that module). Matching is exact string equality.
 */

import { ConfigurationError } from './errors.js';
import type { UserFeatures } from './types.js';

/**
 * Split feature tokens into global and module-scoped sets
 */
export function parseUserFeatures(tokens: readonly string[]): UserFeatures {
  const global = new Set<string>();
  const scoped = new Map<string, Set<string>>();

  for (const token of tokens) {
    const separator = token.indexOf(':');
    if (separator < 0) {
      global.add(token);
      continue;
    }

    const module = token.slice(0, separator);
    const feature = token.slice(separator + 1);
    if (module.length === 0 || feature.length === 0) {
      throw new ConfigurationError(`Malformed user feature '${token}' (expected module:feature)`);
    }

    let features = scoped.get(module);
    if (!features) {
      features = new Set<string>();
      scoped.set(module, features);
    }
    features.add(feature);
  }

  return { global, scoped };
}

/**
 * Features passed to one module's build, each at most once
 */
export function featuresForModule(features: UserFeatures, module: string): string[] {
  const result = new Set(features.global);
  for (const feature of features.scoped.get(module) ?? []) {
    result.add(feature);
  }
  return [...result];
}

/**
 * Module names referenced by scoped features but not selected for the build
 */
export function unmatchedFeatureModules(features: UserFeatures, modules: readonly string[]): string[] {
  return [...features.scoped.keys()].filter(module => !modules.includes(module));
}

/**
 * Render features back to their token form
 */
export function formatUserFeatures(features: UserFeatures): string[] {
  const tokens = [...features.global];
  for (const [module, moduleFeatures] of features.scoped) {
    for (const feature of moduleFeatures) {
      tokens.push(`${module}:${feature}`);
    }
  }
  return tokens;
}
