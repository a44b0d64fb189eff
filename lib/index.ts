export * from './types';
export * from './errors';
export { RetryPolicy, sleep, type RetryPolicyOptions } from './retry';
export { log, configureLogger, parseLevel, type LogLevel, type LogFormat } from './logger';
export { loadConfig, requireApiKey, type AppConfig, type SourceConfig, type DestinationConfig } from './config';
export { placeholderEmail, sanitizeForEmail, userSourceId } from './identity';

export { Database, DEFAULT_DATABASE_PATH } from './db';
export { LocalStore, albumUnit, ALBUM_LIST_UNIT, type UserOverrides } from './db/store';

export { SessionManager, type Session, type BrowserLauncher, type AccountIdentity } from './scraper/session-manager';
export { PageNavigator, PageHandle, type PageAdapter, type View, type ViewParams } from './scraper/page-navigator';
export { PlaywrightPageAdapter, launchPersistentBrowser } from './scraper/playwright-adapter';
export {
  extractAlbumList,
  extractAlbumDetail,
  extractSharingUsers,
  extractAsset,
  type ExtractorContext,
  type ExtractionResult,
} from './scraper/extractors';
export { GPhotosScraper, findStartAlbum, type RunReport, type ExportPhotosOptions } from './scraper/gphotos-scraper';

export { ImmichClient, type DestinationApi, type ImmichClientOptions } from './immich/client';
export {
  Reconciler,
  STAGES,
  ALBUM_STAGES,
  summarizePlan,
  planIsEmpty,
  type Mutation,
  type MutationPlan,
  type ApplyResult,
  type Stage,
} from './sync/reconciler';
export { Semaphore, KeyedMutex } from './sync/semaphore';
export { WarningCollector, type ReportWarning } from './report';
