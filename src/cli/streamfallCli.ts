#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { loadConfigFromJson } from '../config/loader.js';
import { ConfigurationError, formatIssue } from '../config/schema.js';
import type { StreamfallConfigInput } from '../config/types.js';
import { describeDistribution } from '../random/distributions.js';
import { renderImage, type RuntimeConfigResult } from '../runtime/services.js';
import { writeCanonicalJson } from '../serialization/canonicalJson.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`streamfall – stream-field image generator

Commands:
  render [--config <file.json>] [--output <image>] [--seed <n>] [--size <px>] [--streams <n>]
  config validate <file.json> [--json]
  config defaults

Run "streamfall <command> --help" to learn more about a command.`);
};

const printRenderUsage = () => {
  console.log(`streamfall render

Simulate every stream and write the tone-mapped canvas.

Optional:
  --config <path>       JSON configuration merged over the defaults
  --output <image>      Output image; ".ppm" is written directly, anything else
                        through ffmpeg (default "streamfall-<seed>-<size>.png")
  --seed <n>            Random seed (0 – 4294967295)
  --size <px>           Canvas edge length
  --streams <n>         Number of streams
  --forces <n>          Number of forces
  --faucets <n>         Number of faucets
  --shards <n>          Independent stream shards merged in order (default 1)
  --report <path>       Write a canonical JSON run report with BLAKE3 digests
  --ffmpeg <path>       ffmpeg executable (default "ffmpeg")
  --quiet               Do not log the configuration or progress
  --json                Emit the run summary as JSON
`);
};

const printConfigUsage = () => {
  console.log(`streamfall config – configuration utilities

Usage:
  streamfall config validate <file.json> [--json]
  streamfall config defaults
`);
};

const parseInteger = (flag: string, raw: string | undefined): number => {
  const value = Number(raw);
  if (raw === undefined || !Number.isSafeInteger(value)) {
    return exitWithError(`${flag} expects an integer (received "${raw ?? ''}")`);
  }
  return value;
};

const requireValue = (flag: string, raw: string | undefined): string => {
  if (raw === undefined || raw.startsWith('--')) {
    return exitWithError(`${flag} expects a value`);
  }
  return raw;
};

const logConfig = ({ config, configPath, warnings }: RuntimeConfigResult) => {
  console.log(`[config] source: ${configPath ?? 'defaults'}`);
  console.log(
    `[config] ${config.size}px canvas, seed ${config.seed}, ${config.numForces} forces, ${config.numFaucets} faucets, ${config.numStreams} streams`,
  );
  console.log(
    `[config] decay ${describeDistribution(config.decayDist)} capped at ${config.maxDecayFactor}, velocity cap ${config.velocityCap}, color cap ${config.colorCap}`,
  );
  console.log(writeCanonicalJson(config, { indent: 2 }));
  warnings.forEach((issue) => {
    console.warn(`[config] warning: ${formatIssue(issue)}`);
  });
};

const handleRenderCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printRenderUsage();
    process.exit(0);
  }

  const options: {
    config?: string;
    output?: string;
    report?: string;
    ffmpeg: string;
    quiet: boolean;
    json: boolean;
  } = {
    ffmpeg: 'ffmpeg',
    quiet: false,
    json: false,
  };
  const overrides: StreamfallConfigInput = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;
    switch (arg) {
      case '--config':
        options.config = requireValue(arg, args[++i]);
        break;
      case '--output':
        options.output = requireValue(arg, args[++i]);
        break;
      case '--report':
        options.report = requireValue(arg, args[++i]);
        break;
      case '--ffmpeg':
        options.ffmpeg = requireValue(arg, args[++i]);
        break;
      case '--seed':
        overrides.seed = parseInteger(arg, args[++i]);
        break;
      case '--size':
        overrides.size = parseInteger(arg, args[++i]);
        break;
      case '--streams':
        overrides.numStreams = parseInteger(arg, args[++i]);
        break;
      case '--forces':
        overrides.numForces = parseInteger(arg, args[++i]);
        break;
      case '--faucets':
        overrides.numFaucets = parseInteger(arg, args[++i]);
        break;
      case '--shards':
        overrides.shards = parseInteger(arg, args[++i]);
        break;
      case '--quiet':
        options.quiet = true;
        break;
      case '--json':
        options.json = true;
        break;
      default:
        exitWithError(`Unknown flag "${arg}"`);
    }
  }

  const quiet = options.quiet || options.json;

  const summary = await renderImage({
    output: options.output ? resolve(process.cwd(), options.output) : undefined,
    configPath: options.config ? resolve(process.cwd(), options.config) : undefined,
    overrides,
    reportPath: options.report ? resolve(process.cwd(), options.report) : undefined,
    ffmpeg: options.ffmpeg,
    onConfig: quiet ? undefined : logConfig,
    onProgress: quiet
      ? undefined
      : ({ completed, total, shard }) => {
          const percent = total > 0 ? Math.round((completed / total) * 100) : 100;
          console.log(`[render] shard ${shard}: ${completed}/${total} streams (${percent}%)`);
        },
  });

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          status: 'ok',
          output: summary.output,
          encoder: summary.encoder,
          width: summary.width,
          height: summary.height,
          reportPath: summary.reportPath,
          stats: summary.report.stats,
          digests: summary.report.digests,
          durations: summary.durations,
        },
        null,
        2,
      ),
    );
    return;
  }
  const { stats } = summary.report;
  console.log(
    `[render] wrote ${summary.output} (${summary.width}×${summary.height}, ${summary.encoder})`,
  );
  console.log(
    `         ${stats.streams} streams, ${stats.steps} steps, ${stats.deposits} deposits | decayed ${stats.terminations.decayed}, out of bounds ${stats.terminations.outOfBounds}`,
  );
  console.log(
    `         simulate ${summary.durations.simulateMs.toFixed(0)}ms, encode ${summary.durations.encodeMs.toFixed(0)}ms | grid ${summary.report.digests.grid}`,
  );
  if (summary.reportPath) {
    console.log(`         report ${summary.reportPath}`);
  }
};

const handleConfigCommand = async (args: string[]) => {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printConfigUsage();
    process.exit(0);
  }
  const [subcommand, ...rest] = args;
  if (subcommand === 'defaults') {
    console.log(writeCanonicalJson(DEFAULT_CONFIG, { indent: 2 }));
    return;
  }
  if (subcommand !== 'validate') {
    exitWithError(`Unknown config subcommand "${subcommand}".`);
  }

  const json = rest.includes('--json');
  const configPath = rest.find((arg) => !arg.startsWith('--'));
  if (!configPath) {
    return exitWithError('config validate requires a configuration path.');
  }
  const payload = await readFile(resolve(process.cwd(), configPath), 'utf8');
  const result = loadConfigFromJson(payload, configPath);
  if (result.kind === 'success') {
    if (json) {
      console.log(
        JSON.stringify({ status: 'ok', config: result.config, warnings: result.issues }, null, 2),
      );
    } else {
      console.log(`✔ Configuration valid: ${configPath}`);
      console.log(
        `  ${result.config.size}px, ${result.config.numForces} forces, ${result.config.numFaucets} faucets, ${result.config.numStreams} streams`,
      );
      result.issues.forEach((issue) => {
        console.warn(`  • ${formatIssue(issue)}`);
      });
    }
    return;
  }
  if (json) {
    console.log(
      JSON.stringify({ status: 'error', message: result.message, issues: result.issues }, null, 2),
    );
  } else {
    console.error(`✖ Configuration invalid: ${configPath}`);
    console.error(`  ${result.message}`);
    result.issues?.forEach((issue) => {
      console.error(`   • ${formatIssue(issue)}`);
    });
  }
  process.exit(1);
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'render':
      await handleRenderCommand(rest);
      break;
    case 'config':
      await handleConfigCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error) => {
  if (error instanceof ConfigurationError) {
    console.error(`[config] ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
