import { readFile } from 'node:fs/promises';

import { DEFAULT_CONFIG } from './defaults.js';
import { hasErrors, resolveConfig } from './schema.js';
import type { ConfigIssue, StreamfallConfig } from './types.js';

export type ConfigLoadResult =
  | {
      readonly kind: 'success';
      readonly config: StreamfallConfig;
      /** Warnings only. */
      readonly issues: readonly ConfigIssue[];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: readonly ConfigIssue[] | undefined;
      readonly sourceName?: string;
    };

export function loadConfigFromJson(
  json: string,
  sourceName?: string,
  base: StreamfallConfig = DEFAULT_CONFIG,
): ConfigLoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON configuration',
      issues: undefined,
      sourceName,
    };
  }

  const { config, issues } = resolveConfig(parsed, base);
  if (hasErrors(issues)) {
    const count = issues.filter((issue) => issue.severity === 'error').length;
    return {
      kind: 'error',
      message: `Configuration has ${count} error${count === 1 ? '' : 's'}`,
      issues,
      sourceName,
    };
  }
  return { kind: 'success', config, issues, sourceName };
}

export async function loadConfigFile(
  path: string,
  base: StreamfallConfig = DEFAULT_CONFIG,
): Promise<ConfigLoadResult> {
  const json = await readFile(path, 'utf8');
  return loadConfigFromJson(json, path, base);
}
