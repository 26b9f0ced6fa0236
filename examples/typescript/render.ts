/**
 * Renders the sparse example configuration to a PPM file and prints its digest.
 *
 *   npx tsx examples/typescript/render.ts
 */
import { readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  encodePpm,
  gridDigest,
  loadConfigFromJson,
  runSimulation,
  toneMapGrid,
} from '../../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function main() {
  const configPath = join(__dirname, '..', 'configs', 'sparse.json');
  const loaded = loadConfigFromJson(await readFile(configPath, 'utf8'), configPath);
  if (loaded.kind === 'error') {
    throw new Error(`${configPath}: ${loaded.message}`);
  }
  const { config } = loaded;
  const result = runSimulation(config);
  const output = join(__dirname, `sparse-${config.seed}.ppm`);
  await writeFile(output, encodePpm(toneMapGrid(result.grid, config.colorCap), config.size, config.size));

  console.log(`wrote ${output}`);
  console.log(`grid digest: ${gridDigest(result.grid)}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
