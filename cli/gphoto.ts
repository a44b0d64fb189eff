import chalk from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';
import type { AppConfig } from '../lib/config';
import type { LocalStore } from '../lib/db/store';
import { launchPersistentBrowser } from '../lib/scraper/playwright-adapter';
import {
  GPhotosScraper,
  type AlbumCompletedEvent,
  type AlbumFailedEvent,
  type AlbumIncompleteEvent,
  type AlbumProgressEvent,
  type RunReport,
} from '../lib/scraper/gphotos-scraper';
import { SessionManager } from '../lib/scraper/session-manager';
import {
  action,
  commandConfig,
  onInterrupt,
  parseOptions,
  printHeader,
  printSummary,
  printWarnings,
  withStore,
} from './run';

const LoginOptions = z.object({
  clearStorage: z.boolean().default(false),
});

const ExportAlbumsOptions = z.object({
  fresh: z.boolean().default(false),
});

const ExportPhotosOptions = z.object({
  fresh: z.boolean().default(false),
  maxAlbums: z.coerce.number().int().positive().optional(),
  refreshAssets: z.boolean().default(false),
  startAlbum: z.string().trim().min(1).optional(),
  clearStorage: z.boolean().default(false),
});

export function createScraper(
  config: AppConfig,
  store: LocalStore,
  options: { clearStorage?: boolean } = {}
): GPhotosScraper {
  const { source } = config;
  const sessions = new SessionManager({
    baseUrl: source.baseUrl,
    profileDir: source.profileDir,
    headless: source.headless,
    navigationTimeoutMs: source.navigationTimeoutMs,
    waitCeilingMs: source.waitCeilingMs,
    clearStorage: options.clearStorage ?? false,
    launcher: launchPersistentBrowser,
  });
  return new GPhotosScraper({
    store,
    sessions,
    baseUrl: source.baseUrl,
    navigationTimeoutMs: source.navigationTimeoutMs,
    waitCeilingMs: source.waitCeilingMs,
    stablePolls: source.stablePolls,
  });
}

function reportProgress(scraper: GPhotosScraper) {
  const position = (event: AlbumProgressEvent) => chalk.dim(`[${event.index + 1}/${event.total}]`);

  scraper.on('album-started', (event: AlbumProgressEvent) => {
    console.log(`${position(event)} ${chalk.blue('→')} ${event.title}`);
  });
  scraper.on('album-completed', (event: AlbumCompletedEvent) => {
    console.log(`${position(event)} ${chalk.green('✓')} ${event.title} ${chalk.dim(`(${event.assets} new asset(s))`)}`);
  });
  scraper.on('album-skipped', (event: AlbumProgressEvent) => {
    console.log(`${position(event)} ${chalk.yellow('○')} ${chalk.dim(`${event.title} (already exported)`)}`);
  });
  scraper.on('album-incomplete', (event: AlbumIncompleteEvent) => {
    console.log(
      `${position(event)} ${chalk.yellow('◐')} ${event.title} ` +
      chalk.dim(`(${event.assets} new asset(s), ${event.failures} skipped; run again to retry them)`)
    );
  });
  scraper.on('album-failed', (event: AlbumFailedEvent) => {
    console.log(`${position(event)} ${chalk.red('✗')} ${event.title}: ${chalk.red(event.error)}`);
  });
}

function printRunReport(report: RunReport, startedAt: number) {
  printSummary([
    { label: 'Completed', value: report.completed, tone: 'good' },
    { label: 'Incomplete', value: report.incomplete, tone: 'warn' },
    { label: 'Failed', value: report.failed, tone: 'bad' },
    { label: 'Skipped', value: report.skipped, tone: 'warn' },
    { label: 'Assets', value: report.assets },
    { label: 'Status', value: report.status },
  ], Date.now() - startedAt);
  printWarnings(report.warnings);
}

async function runExport(
  command: Command,
  title: string,
  settings: Array<[string, string | number | boolean]>,
  run: (scraper: GPhotosScraper) => Promise<RunReport>,
  options: { clearStorage?: boolean } = {}
) {
  const config = commandConfig(command);
  printHeader(title, [
    ['Database', config.databasePath],
    ['Profile', config.source.profileDir],
    ['Headless', config.source.headless],
    ...settings,
  ]);

  await withStore(config, async store => {
    const scraper = createScraper(config, store, options);
    reportProgress(scraper);
    const removeHandler = onInterrupt(() => scraper.requestStop());
    const startedAt = Date.now();
    try {
      printRunReport(await run(scraper), startedAt);
    } finally {
      removeHandler();
    }
  });
}

export function gphotoCommand(): Command {
  const gphoto = new Command('gphoto')
    .description('Extract shared-album metadata from the Google Photos web UI')
    .option('--profile-dir <dir>', 'persistent browser profile directory')
    .option('--headless', 'run the browser without a window');

  gphoto
    .command('login')
    .description('Open a browser window to sign in; the session is kept in the profile directory')
    .option('--clear-storage', 'empty the site\'s browser storage first (cookies are kept)')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(LoginOptions, options);
      const config = commandConfig(command);
      printHeader('GOOGLE PHOTOS LOGIN', [['Profile', config.source.profileDir]]);
      console.log(chalk.blue('Sign in in the browser window, it closes once the albums are reachable.'));

      await withStore(config, async store => {
        const account = await createScraper(config, store, { clearStorage: opts.clearStorage }).login();
        const who = account ? `${account.displayName}${account.email ? ` <${account.email}>` : ''}` : 'unknown account';
        console.log(`\n  ${chalk.green('✓')} Signed in as ${chalk.bold(who)}`);
      });
    }));

  gphoto
    .command('export-albums')
    .description('Store the album list and the signed-in account')
    .option('--fresh', 'extract the album list again even if it was exported before')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(ExportAlbumsOptions, options);
      await runExport(command, 'EXPORT ALBUMS', [['Fresh', opts.fresh]], scraper =>
        scraper.exportAlbums({ fresh: opts.fresh })
      );
    }));

  gphoto
    .command('export-photos')
    .description('Extract members, assets and tags of every album not yet exported')
    .option('--fresh', 'ignore album checkpoints and extract every album again')
    .option('--max-albums <n>', 'stop after this many albums')
    .option('--refresh-assets', 'open assets that are already stored again')
    .option('--start-album <album>', 'skip the albums listed before this one (source id or title)')
    .option('--clear-storage', 'empty the site\'s browser storage first (cookies are kept)')
    .action(action(async (options: unknown, command: Command) => {
      const opts = parseOptions(ExportPhotosOptions, options);
      await runExport(command, 'EXPORT PHOTOS', [
        ['Fresh', opts.fresh],
        ['Refresh assets', opts.refreshAssets],
        ['Max albums', opts.maxAlbums ?? 'all'],
        ['Start album', opts.startAlbum ?? 'first'],
      ], scraper => scraper.exportPhotos({
        fresh: opts.fresh,
        refreshAssets: opts.refreshAssets,
        ...(opts.maxAlbums !== undefined ? { maxAlbums: opts.maxAlbums } : {}),
        ...(opts.startAlbum !== undefined ? { startAlbum: opts.startAlbum } : {}),
      }), { clearStorage: opts.clearStorage });
    }));

  return gphoto;
}
