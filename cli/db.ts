import chalk from 'chalk';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { albumUnit, LocalStore, type UserOverrides } from '../lib/db/store';
import {
  action,
  commandConfig,
  formatBytes,
  parseOptions,
  printHeader,
  printTable,
  withStore,
} from './run';

const InitOptions = z.object({ reset: z.boolean().default(false) });
const ShowAlbumsOptions = z.object({ notFinished: z.boolean().default(false) });
const ShowErrorsOptions = z.object({
  run: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().default(50),
});
const SetUserOptions = z.object({
  email: z.string().email().optional(),
  name: z.string().min(1).optional(),
  skip: z.boolean().optional(),
  include: z.boolean().optional(),
  destinationId: z.string().min(1).optional(),
});

function yesNo(value: boolean): string {
  return value ? chalk.green('yes') : chalk.dim('no');
}

export function dbCommand(): Command {
  const db = new Command('db').description('Inspect and edit the local store');

  db
    .command('init')
    .description('Create the local store (or check an existing one)')
    .option('--reset', 'drop every table first')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(InitOptions, options);
      const config = commandConfig(command);

      const store = await LocalStore.open(config.databasePath);
      if (opts.reset) {
        await store.db.dropAll();
        await store.db.open();
        console.log(chalk.yellow(`Reset ${config.databasePath}`));
      }
      await store.close();
      console.log(`${chalk.green('✓')} Local store ready at ${chalk.bold(config.databasePath)}`);
    }));

  db
    .command('show-albums')
    .description('List stored albums with their export progress')
    .option('--not-finished', 'only albums whose contents are not exported yet')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(ShowAlbumsOptions, options);
      await withStore(commandConfig(command), async store => {
        const albums = await store.query('album', { notFinished: opts.notFinished });
        const rows: Array<Array<string | number | null>> = [];
        for (const album of albums) {
          rows.push([
            album.position + 1,
            album.title,
            album.shared ? 'shared' : 'own',
            `${album.storedItems}/${album.itemCount}`,
            album.memberSourceIds.length,
            yesNo(await store.isCheckpointed(albumUnit(album.sourceId))),
            album.sourceId,
          ]);
        }
        printTable(['#', 'Title', 'Kind', 'Items', 'Members', 'Done', 'Source id'], rows);
      });
    }));

  db
    .command('show-users')
    .description('List stored users and how they map to the destination')
    .action(action(async (_options: unknown, command: Command) => {
      await withStore(commandConfig(command), async store => {
        const users = await store.query('user', {});
        const mappings = await store.getMappings('user');
        printTable(
          ['Name', 'Email', 'Role', 'Import', 'Destination email', 'Destination id', 'Source id'],
          users.map(user => [
            user.destinationName ?? user.displayName,
            user.email,
            user.role,
            yesNo(user.addToDestination),
            user.destinationEmail,
            mappings.get(user.sourceId) ?? null,
            user.sourceId,
          ])
        );
      });
    }));

  db
    .command('show-stats')
    .description('Counts, mappings and per-album progress')
    .action(action(async (_options: unknown, command: Command) => {
      const config = commandConfig(command);
      await withStore(config, async store => {
        const stats = await store.getStats();
        printHeader('LOCAL STORE', [
          ['Database', `${config.databasePath} (${formatBytes(stats.databaseSizeBytes)})`],
          ['Users', `${stats.users} (${stats.usersForDestination} to import)`],
          ['Albums', `${stats.albums} (${stats.albumsFinished} exported)`],
          ['Assets', stats.assets],
          ['Album entries', stats.albumAssets],
          ['Tags', `${stats.tags} (${stats.tagTombstones} deleted)`],
          ['Errors', stats.errors],
          [
            'Mapped',
            `${stats.mappings.user} user(s), ${stats.mappings.album} album(s), ${stats.mappings.asset} asset(s), ${stats.mappings.tag} tag(s)`,
          ],
        ]);

        if (stats.lastRun) {
          const run = stats.lastRun;
          console.log(
            `${chalk.dim('Last run:')} #${run.id} ${run.kind} ${run.status}, ` +
            `${run.unitsCompleted} done / ${run.unitsFailed} failed, started ${run.startedAt}` +
            (run.errorMessage ? chalk.red(` (${run.errorMessage})`) : '')
          );
          console.log('');
        }

        printTable(
          ['Album', 'Items', 'Stored', 'Done', 'Errors'],
          stats.albumDetails.map(album => [
            album.title,
            album.itemCount,
            album.storedItems,
            yesNo(album.finished),
            album.errors > 0 ? chalk.red(String(album.errors)) : 0,
          ])
        );
      });
    }));

  db
    .command('show-errors')
    .description('Recent extraction and import errors')
    .option('--run <id>', 'only errors of this scrape run')
    .option('--limit <n>', 'how many to show', '50')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(ShowErrorsOptions, options);
      await withStore(commandConfig(command), async store => {
        const errors = await store.listErrors({
          limit: opts.limit,
          ...(opts.run !== undefined ? { runId: opts.run } : {}),
        });
        printTable(
          ['When', 'Run', 'Entity', 'Operation', 'Category', 'Message'],
          errors.map(error => [
            error.createdAt,
            error.runId,
            `${error.entityKind}:${error.entityId}`,
            error.operation,
            error.category,
            error.message,
          ])
        );
      });
    }));

  db
    .command('set-user')
    .description('Override how a user is created at the destination')
    .argument('<sourceId>', 'user source id (see show-users)')
    .option('--email <email>', 'email to use at the destination')
    .option('--name <name>', 'name to use at the destination')
    .addOption(new Option('--skip', 'do not import this user').conflicts('include'))
    .addOption(new Option('--include', 'import this user'))
    .option('--destination-id <id>', 'link to an existing destination user')
    .action(action(async (sourceId: string, options: unknown, command: Command) => {
      const opts = parseOptions(SetUserOptions, options);
      await withStore(commandConfig(command), async store => {
        const overrides: UserOverrides = {};
        if (opts.email !== undefined) overrides.email = opts.email;
        if (opts.name !== undefined) overrides.name = opts.name;
        if (opts.skip) overrides.addToDestination = false;
        if (opts.include) overrides.addToDestination = true;

        if (!(await store.setUserOverrides(sourceId, overrides))) {
          throw new Error(`Unknown user "${sourceId}"`);
        }
        if (opts.destinationId) {
          await store.setMapping('user', sourceId, opts.destinationId);
        }
        console.log(`${chalk.green('✓')} Updated ${chalk.bold(sourceId)}`);
      });
    }));

  db
    .command('delete-tag')
    .description('Mark a tag deleted; the next import removes it at the destination')
    .argument('<label>', 'tag label')
    .action(action(async (label: string, _options: unknown, command: Command) => {
      await withStore(commandConfig(command), async store => {
        if (!(await store.markTagDeleted(label))) {
          throw new Error(`Unknown tag "${label}"`);
        }
        console.log(`${chalk.green('✓')} Tag ${chalk.bold(label)} marked deleted`);
      });
    }));

  return db;
}
