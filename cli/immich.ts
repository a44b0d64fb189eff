import chalk from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';
import { requireApiKey, type AppConfig } from '../lib/config';
import type { LocalStore } from '../lib/db/store';
import { ImmichClient, type DestinationAlbum } from '../lib/immich/client';
import {
  ALBUM_STAGES,
  DEFAULT_CONCURRENCY,
  Reconciler,
  STAGES,
  planIsEmpty,
  summarizePlan,
  type MutationOutcome,
  type MutationPlan,
  type Stage,
} from '../lib/sync/reconciler';
import {
  action,
  commandConfig,
  onInterrupt,
  parseOptions,
  printHeader,
  printSummary,
  printTable,
  printWarnings,
  withStore,
} from './run';

const CreateAlbumOptions = z.object({
  dryRun: z.boolean().default(false),
});

const ListAlbumsOptions = z.object({
  limit: z.coerce.number().int().positive().default(50),
  shared: z.boolean().optional(),
});

const ImportPhotosOptions = z.object({
  dryRun: z.boolean().default(false),
  concurrency: z.coerce.number().int().min(1).max(32).default(DEFAULT_CONCURRENCY),
});

export function createClient(config: AppConfig): ImmichClient {
  return new ImmichClient({
    endpoint: config.destination.endpoint,
    apiKey: requireApiKey(config.destination),
    timeoutMs: config.destination.timeoutMs,
  });
}

export function createReconciler(config: AppConfig, store: LocalStore, concurrency?: number): Reconciler {
  return new Reconciler({
    store,
    destination: createClient(config),
    emailDomain: config.destination.emailDomain,
    defaultPassword: config.destination.defaultPassword,
    ...(concurrency !== undefined ? { concurrency } : {}),
  });
}

/** Albums by name, at most `limit` of them */
export function selectAlbums(albums: DestinationAlbum[], limit: number): DestinationAlbum[] {
  return [...albums].sort((a, b) => a.albumName.localeCompare(b.albumName)).slice(0, limit);
}

function printPlan(plan: MutationPlan) {
  const counts = summarizePlan(plan);
  if (planIsEmpty(plan)) {
    console.log(`${chalk.green('✓')} Destination is up to date`);
  } else {
    console.log(chalk.dim('Planned mutations:'));
    for (const [type, count] of counts) {
      console.log(`  ${chalk.blue('•')} ${type}: ${chalk.yellow(count)}`);
    }
    if (plan.purge.length > 0) {
      console.log(`  ${chalk.blue('•')} deleted tag(s) to forget locally: ${chalk.yellow(plan.purge.length)}`);
    }
  }

  if (plan.unresolved.length > 0) {
    console.log(chalk.yellow(`\n${plan.unresolved.length} asset(s) not found at the destination:`));
    for (const asset of plan.unresolved.slice(0, 20)) {
      console.log(`  ${chalk.yellow('○')} ${asset.filename ?? asset.sourceId} ${chalk.dim(`(${asset.reason})`)}`);
    }
    if (plan.unresolved.length > 20) {
      console.log(chalk.dim(`  ... and ${plan.unresolved.length - 20} more`));
    }
  }
  console.log('');
}

function describeOutcomes(title: string, outcomes: MutationOutcome[]) {
  if (outcomes.length === 0) return;
  console.log(chalk.bold(title));
  printTable(['Mutation', 'Reason'], outcomes.map(outcome => [outcome.mutation.id, outcome.reason ?? null]));
  console.log('');
}

async function reconcile(
  command: Command,
  title: string,
  stages: readonly Stage[],
  options: { dryRun: boolean; concurrency?: number }
) {
  const config = commandConfig(command);
  const settings: Array<[string, string | number | boolean]> = [
    ['Endpoint', config.destination.endpoint],
    ['Database', config.databasePath],
    ['Stages', stages.join(' → ')],
    ['Dry run', options.dryRun],
  ];
  if (options.concurrency !== undefined) settings.push(['Concurrency', options.concurrency]);
  printHeader(title, settings);

  await withStore(config, async store => {
    const reconciler = createReconciler(config, store, options.concurrency);
    const plan = await reconciler.plan({ stages });
    printPlan(plan);
    if (options.dryRun || planIsEmpty(plan)) return;

    reconciler.on('mutation-applied', (outcome: MutationOutcome) => {
      console.log(`  ${chalk.green('✓')} ${outcome.mutation.id}`);
    });

    const removeHandler = onInterrupt(() => reconciler.requestStop());
    const startedAt = Date.now();
    try {
      const result = await reconciler.apply(plan);
      printSummary([
        { label: 'Applied', value: result.applied, tone: 'good' },
        { label: 'Failed', value: result.failed.length, tone: 'bad' },
        { label: 'Blocked', value: result.blocked.length, tone: 'warn' },
        { label: 'Skipped', value: result.skipped, tone: 'warn' },
        { label: 'Unresolved', value: plan.unresolved.length },
        ...(result.purged.length > 0 ? [{ label: 'Tags purged', value: result.purged.length }] : []),
      ], Date.now() - startedAt);
      describeOutcomes('Failed:', result.failed);
      describeOutcomes('Blocked:', result.blocked);
      printWarnings(result.warnings);
      if (result.stopped) console.log(chalk.yellow('Stopped early; run the command again to continue.'));
    } finally {
      removeHandler();
    }
  });
}

export function immichCommand(): Command {
  const immich = new Command('immich')
    .description('Reconcile the local store into an Immich server')
    .option('--endpoint <url>', 'Immich server URL')
    .option('--api-key <key>', 'Immich API key (admin)');

  immich
    .command('create-album')
    .description('Create users and albums with their members')
    .option('--dry-run', 'print the plan without changing anything')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(CreateAlbumOptions, options);
      await reconcile(command, 'IMMICH CREATE ALBUMS', ALBUM_STAGES, { dryRun: opts.dryRun });
    }));

  immich
    .command('import-photos')
    .description('Run every stage: users, albums, asset owners, album contents and tags')
    .option('--dry-run', 'print the plan without changing anything')
    .option('--concurrency <n>', 'mutations in flight at once', String(DEFAULT_CONCURRENCY))
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(ImportPhotosOptions, options);
      await reconcile(command, 'IMMICH IMPORT PHOTOS', STAGES, opts);
    }));

  immich
    .command('list-albums')
    .description('List albums at the destination')
    .option('--limit <n>', 'show at most this many albums', '50')
    .option('--shared', 'only albums shared with other users')
    .option('--no-shared', 'only albums nobody else is a member of')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(ListAlbumsOptions, options);
      const config = commandConfig(command);
      const albums = await createClient(config).listAlbums(opts.shared === undefined ? {} : { shared: opts.shared });
      const shown = selectAlbums(albums, opts.limit);
      printTable(
        ['Name', 'Assets', 'Members', 'Id'],
        shown.map(album => [album.albumName, album.assetCount, album.memberIds.length, album.id])
      );
      if (albums.length > shown.length) {
        console.log(chalk.dim(`... and ${albums.length - shown.length} more (raise --limit to see them)`));
      }
    }));

  return immich;
}
