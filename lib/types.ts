// ============================================
// SOURCE RECORDS (extractor output, store input)
// ============================================

export type UserRole = 'owner' | 'shared';
export type MediaType = 'photo' | 'video';
export type EntityKind = 'user' | 'album' | 'asset' | 'tag';

export interface UserRecord {
  kind: 'user';
  sourceId: string;
  displayName: string;
  email: string | null;
  role: UserRole;
}

export interface AlbumRecord {
  kind: 'album';
  sourceId: string;
  title: string;
  url: string;
  ownerSourceId: string | null;
  shared: boolean;
  itemCount: number;
  position: number;
  /** Replaces the member set when present; the owner is always added */
  memberSourceIds?: string[];
  sourceCreatedAt?: string | null;
  sourceModifiedAt?: string | null;
}

export interface SavedFlag {
  userSourceId: string;
  saved: boolean;
}

export interface AssetRecord {
  kind: 'asset';
  sourceId: string;
  filename: string | null;
  mediaType: MediaType;
  /** ISO 8601, local time of capture as shown by the source */
  takenAt: string | null;
  ownerSourceId: string | null;
  savedBy?: SavedFlag[];
  tags?: string[];
}

export interface AlbumAssetRecord {
  kind: 'album-asset';
  albumSourceId: string;
  assetSourceId: string;
  position: number;
}

export interface TagRecord {
  kind: 'tag';
  label: string;
}

export type SourceRecord =
  | UserRecord
  | AlbumRecord
  | AssetRecord
  | AlbumAssetRecord
  | TagRecord;

// ============================================
// STORED ENTITIES (store output)
// ============================================

export interface StoredUser {
  sourceId: string;
  displayName: string;
  email: string | null;
  role: UserRole;
  addToDestination: boolean;
  /** Manual override of the email used at the destination */
  destinationEmail: string | null;
  /** Manual override of the name used at the destination */
  destinationName: string | null;
}

export interface StoredAlbum {
  sourceId: string;
  title: string;
  url: string;
  ownerSourceId: string | null;
  shared: boolean;
  itemCount: number;
  position: number;
  memberSourceIds: string[];
  sourceCreatedAt: string | null;
  sourceModifiedAt: string | null;
  /** Number of asset associations stored for this album */
  storedItems: number;
}

export interface StoredAsset {
  sourceId: string;
  filename: string | null;
  mediaType: MediaType;
  takenAt: string | null;
  ownerSourceId: string | null;
  savedBy: SavedFlag[];
  tags: string[];
}

export interface StoredTag {
  label: string;
  deletedAt: string | null;
  assetSourceIds: string[];
}

export interface StoredAlbumAsset {
  albumSourceId: string;
  assetSourceId: string;
  position: number;
}

export interface EntityRows {
  user: StoredUser;
  album: StoredAlbum;
  asset: StoredAsset;
  'album-asset': StoredAlbumAsset;
  tag: StoredTag;
}

export type QueryKind = keyof EntityRows;

export interface QueryFilter {
  sourceIds?: string[];
  /** album-asset rows of one album */
  albumSourceId?: string;
  /** Include tag tombstones */
  includeDeleted?: boolean;
  /** Albums without a completed checkpoint */
  notFinished?: boolean;
  /** Users flagged for import at the destination */
  onlyForDestination?: boolean;
}

// ============================================
// BOOKKEEPING
// ============================================

export type ScrapeRunKind = 'albums' | 'photos';
export type ScrapeRunStatus = 'running' | 'completed' | 'stopped' | 'failed';

export interface ScrapeRun {
  id: number;
  kind: ScrapeRunKind;
  status: ScrapeRunStatus;
  unitsCompleted: number;
  unitsFailed: number;
  errorMessage: string | null;
  startedAt: string;
  completedAt: string | null;
}

export interface Checkpoint {
  unit: string;
  runId: number | null;
  completedAt: string;
}

export interface ScrapeErrorEntry {
  runId: number | null;
  /** Album being extracted when the error happened */
  albumSourceId?: string | null;
  entityKind: string;
  entityId: string;
  operation: string;
  category: string;
  message: string;
}

export interface StoredScrapeError extends ScrapeErrorEntry {
  id: number;
  createdAt: string;
}

export interface Mapping {
  entityKind: EntityKind;
  sourceId: string;
  destinationId: string;
  updatedAt: string;
}

export interface AlbumStats {
  sourceId: string;
  title: string;
  itemCount: number;
  storedItems: number;
  finished: boolean;
  errors: number;
}

export interface StoreStats {
  users: number;
  usersForDestination: number;
  albums: number;
  albumsFinished: number;
  assets: number;
  albumAssets: number;
  tags: number;
  tagTombstones: number;
  mappings: Record<EntityKind, number>;
  errors: number;
  lastRun: ScrapeRun | null;
  albumDetails: AlbumStats[];
  databaseSizeBytes: number;
}
