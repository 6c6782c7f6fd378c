#!/usr/bin/env node
import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
// loads .env before the logger reads LOG_LEVEL
import { env } from '../config/env.js';
import { createLogger } from '../../logging/logger.js';
import { parseArgs } from './args.js';
import { generateWorld } from './pipeline.js';
import { toWorldSnapshot } from './snapshot.js';

const log = createLogger('worldgen:cli');

function main() {
  const options = parseArgs(process.argv, {
    seed: env.WORLD_SEED,
    width: env.WORLD_WIDTH,
    height: env.WORLD_HEIGHT,
    output: env.WORLD_OUTPUT,
  });
  const startTime = Date.now();

  log.info(`Seed: ${options.seed}, grid: ${options.width}x${options.height}, output: ${options.output}`);

  const world = generateWorld(options.seed, options.width, options.height);

  const outputPath = resolve(options.output);
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(
    outputPath,
    JSON.stringify(
      {
        snapshot: toWorldSnapshot(world),
        startPosition: world.findStartPosition() ?? null,
        locations: world.locations,
        report: world.report,
      },
      null,
      2,
    ),
  );

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  log.info(
    {
      locations: world.locations.length,
      scarcity: world.report.placement.scarcity.length,
      degenerate: world.report.heightMap.degenerate,
      elapsed,
    },
    `Generation complete: ${outputPath}`,
  );
}

try {
  main();
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Generation failed:', message);
  process.exit(1);
}
