#!/usr/bin/env tsx
/**
 * Inspect or replay dead-lettered messages for one working queue.
 * Usage:
 *   npm run dlq:replay -- <queue> --list [--limit 20]
 *   npm run dlq:replay -- <queue> [--limit 20]
 */
import { config } from '../src/config/env';
import { buildPipelineTopology, declaredQueues } from '../src/broker/topology';
import { createPipelineContext } from '../src/infrastructure/container';
import { createLogger } from '../src/infrastructure/logger';

const logger = createLogger({ level: config.LOG_LEVEL, nodeEnv: config.NODE_ENV, name: 'dlq-replay' });
const ctx = createPipelineContext(config, logger);

function parseArgs(argv: string[]): { queue?: string; list: boolean; limit: number } {
  const limitIndex = argv.indexOf('--limit');
  const limit = limitIndex >= 0 ? Number(argv[limitIndex + 1]) : 20;
  const queue = argv.find((a, i) => !a.startsWith('--') && (limitIndex < 0 || i !== limitIndex + 1));
  return { queue, list: argv.includes('--list'), limit: Number.isFinite(limit) && limit > 0 ? limit : 20 };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const known = declaredQueues(buildPipelineTopology(config.BROKER_EXCHANGE));
  if (!args.queue || !known.includes(args.queue)) {
    console.error(`Usage: npm run dlq:replay -- <queue> [--list] [--limit N]\nQueues: ${known.join(', ')}`);
    process.exitCode = 1;
    return;
  }

  if (args.list) {
    const records = await ctx.broker.listDeadLetters(args.queue, args.limit);
    console.log(JSON.stringify(records, null, 2));
    console.log(`${records.length} dead-lettered message(s) shown for ${args.queue}`);
    return;
  }

  await ctx.broker.declareTopology();
  const result = await ctx.broker.replayDeadLetters(args.queue, args.limit);
  console.log('Replay finished:', { queue: args.queue, ...result });
}

main()
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(async () => {
    await ctx.close();
  });
