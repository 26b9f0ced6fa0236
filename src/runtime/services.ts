import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { performance } from 'node:perf_hooks';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { loadConfigFile } from '../config/loader.js';
import { ConfigurationError, resolveConfig, throwOnErrors } from '../config/schema.js';
import type { ConfigIssue, StreamfallConfig, StreamfallConfigInput } from '../config/types.js';
import { encodeImage } from '../cli/utils/ffmpeg.js';
import { runSimulation, type RunProgress } from '../run/orchestrator.js';
import { createRunReport, writeRunReport, type RunReport } from '../run/report.js';
import { encodePpm } from '../render/ppm.js';
import { toneMapGrid } from '../render/toneMap.js';

export type RuntimeConfigResult = {
  config: StreamfallConfig;
  /** Warnings raised while resolving; errors throw instead. */
  warnings: readonly ConfigIssue[];
  configPath?: string;
};

/** Defaults, then the JSON file at `configPath`, then `overrides`. */
export const resolveRuntimeConfig = async (
  configPath?: string,
  overrides: StreamfallConfigInput = {},
): Promise<RuntimeConfigResult> => {
  let base = DEFAULT_CONFIG;
  const warnings: ConfigIssue[] = [];
  if (configPath) {
    const loaded = await loadConfigFile(configPath);
    if (loaded.kind === 'error') {
      throw new ConfigurationError(`${configPath}: ${loaded.message}`, loaded.issues ?? []);
    }
    base = loaded.config;
    warnings.push(...loaded.issues);
  }
  const { config, issues } = resolveConfig(overrides, base);
  throwOnErrors(issues);
  warnings.push(...issues);
  return { config, warnings, configPath };
};

export type RenderOptions = {
  /** Defaults to `defaultOutputName(config)`. */
  output?: string;
  configPath?: string;
  overrides?: StreamfallConfigInput;
  /** Where to write the canonical JSON run report, if anywhere. */
  reportPath?: string;
  ffmpeg?: string;
  onConfig?: (resolved: RuntimeConfigResult) => void;
  onProgress?: (progress: RunProgress) => void;
};

export type RenderResult = {
  output: string;
  encoder: 'ppm' | 'ffmpeg';
  width: number;
  height: number;
  reportPath: string | null;
  report: RunReport;
  durations: {
    simulateMs: number;
    encodeMs: number;
  };
};

export const defaultOutputName = (config: Pick<StreamfallConfig, 'seed' | 'size'>): string =>
  `streamfall-${config.seed}-${config.size}.png`;

const ensureParentDir = async (path: string) => {
  await mkdir(dirname(path), { recursive: true });
};

export const renderImage = async (options: RenderOptions): Promise<RenderResult> => {
  const resolved = await resolveRuntimeConfig(options.configPath, options.overrides);
  options.onConfig?.(resolved);
  const { config } = resolved;

  const simulateStart = performance.now();
  const result = runSimulation(config, { onProgress: options.onProgress });
  const simulateMs = performance.now() - simulateStart;

  const encodeStart = performance.now();
  const rgba = toneMapGrid(result.grid, config.colorCap);
  const output = options.output ?? defaultOutputName(config);
  await ensureParentDir(output);
  const encoder = extname(output).toLowerCase() === '.ppm' ? 'ppm' : 'ffmpeg';
  if (encoder === 'ppm') {
    await writeFile(output, encodePpm(rgba, config.size, config.size));
  } else {
    await encodeImage(options.ffmpeg ?? 'ffmpeg', rgba, config.size, config.size, output);
  }
  const encodeMs = performance.now() - encodeStart;

  const report = createRunReport(config, result);
  if (options.reportPath) {
    await ensureParentDir(options.reportPath);
    await writeFile(options.reportPath, `${writeRunReport(report)}\n`);
  }

  return {
    output,
    encoder,
    width: config.size,
    height: config.size,
    reportPath: options.reportPath ?? null,
    report,
    durations: { simulateMs, encodeMs },
  };
};
