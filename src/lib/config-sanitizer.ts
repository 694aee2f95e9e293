/**
 * Configuration sanitizer
 *
 * Repairs stored values the accessors cannot use, once, when a configuration
 * enters the store. Accessors stay pure reads.
 */

import {
  DEFAULT_RETRY_DEPTH,
  MAX_RETRY_DEPTH,
  RETRY_DEPTH_PATTERN,
} from '../config/reincarnation-config';
import type { ReincarnationConfig } from '../types/reincarnation';

export interface SanitizeResult {
  config: ReincarnationConfig;
  /** Names of the fields that were repaired */
  repairs: Array<keyof ReincarnationConfig>;
}

/**
 * Parse a stored retry depth.
 *
 * @returns The depth, or null when the value is missing, malformed or out of range
 */
export function parseRetryDepth(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined || !RETRY_DEPTH_PATTERN.test(raw)) {
    return null;
  }
  const depth = Number(raw);
  return depth <= MAX_RETRY_DEPTH ? depth : null;
}

/**
 * Return a copy of the configuration with unusable values replaced.
 */
export function sanitizeConfig(config: ReincarnationConfig): SanitizeResult {
  const repairs: SanitizeResult['repairs'] = [];
  let maxDepth = config.maxDepth;

  if (parseRetryDepth(maxDepth) === null) {
    maxDepth = String(DEFAULT_RETRY_DEPTH);
    repairs.push('maxDepth');
  }

  return {
    config: {
      ...config,
      regExprs: config.regExprs.map((rule) => ({ ...rule })),
      maxDepth,
    },
    repairs,
  };
}
