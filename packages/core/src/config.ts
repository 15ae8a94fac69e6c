// Run-time options shared by every action

import { isMethodId, METHOD_IDS, METHODS, type MethodId } from './constants.js';
import { UnsupportedMethodError } from './errors.js';

export interface RomanizationConfig {
  /** Pass through unparseable text instead of marking it with (!) */
  skipErrors: boolean;
  /** Collect per-syllable diagnostics into results */
  reportErrors: boolean;
  /** Emit step-by-step parse trace lines */
  crumbs: boolean;
}

export const DEFAULT_CONFIG: Readonly<RomanizationConfig> = {
  skipErrors: false,
  reportErrors: false,
  crumbs: false,
};

export function createConfig(overrides: Partial<RomanizationConfig> = {}): RomanizationConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Read defaults from ROMAN_TOOLS_* environment variables.
 * Unset or unrecognized values fall back to the defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RomanizationConfig {
  return createConfig({
    skipErrors: parseFlag(env.ROMAN_TOOLS_SKIP_ERRORS) ?? DEFAULT_CONFIG.skipErrors,
    reportErrors: parseFlag(env.ROMAN_TOOLS_REPORT_ERRORS) ?? DEFAULT_CONFIG.reportErrors,
    crumbs: parseFlag(env.ROMAN_TOOLS_CRUMBS) ?? DEFAULT_CONFIG.crumbs,
  });
}

/** Resolve "pinyin", "py", "wade-giles" or "wg" (any case) to a method id */
export function parseMethod(name: string): MethodId {
  const normalized = name.trim().toLowerCase();
  if (isMethodId(normalized)) return normalized;
  const match = METHOD_IDS.find(id => METHODS[id].name === normalized);
  if (!match) {
    throw new UnsupportedMethodError(name);
  }
  return match;
}
