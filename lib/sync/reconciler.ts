import { EventEmitter } from 'events';
import { errorCategory, errorMessage } from '../errors';
import type { DestinationAlbum, DestinationApi, DestinationAsset } from '../immich/client';
import { placeholderEmail } from '../identity';
import { log } from '../logger';
import type { LocalStore } from '../db/store';
import { WarningCollector, type ReportWarning } from '../report';
import type { EntityKind, StoredAsset, StoredUser } from '../types';
import { KeyedMutex, Semaphore } from './semaphore';

// ============================================
// MUTATIONS
// ============================================

export type Stage = 'users' | 'albums' | 'assets' | 'album-assets' | 'tags';

export const STAGES: readonly Stage[] = ['users', 'albums', 'assets', 'album-assets', 'tags'];

/** Stages run by `immich create-album` */
export const ALBUM_STAGES: readonly Stage[] = ['users', 'albums'];

interface MutationBase {
  /** `<type>:<source key>`, unique within a plan */
  id: string;
  stage: Stage;
  /** Destination entity the mutation touches; serializes mutations on it */
  target: string;
  /** Ids of mutations that must have been applied first */
  dependsOn: string[];
}

export type Mutation = MutationBase & (
  | { type: 'create-user'; userSourceId: string; email: string; name: string }
  | { type: 'update-user'; userSourceId: string; patch: { email?: string; name?: string } }
  | { type: 'create-album'; albumSourceId: string; albumName: string; ownerSourceId: string | null }
  | { type: 'update-album'; albumSourceId: string; patch: { albumName: string } }
  | { type: 'add-album-members'; albumSourceId: string; userSourceIds: string[] }
  | { type: 'reassign-asset-owner'; assetSourceId: string; ownerSourceId: string }
  | { type: 'add-album-assets'; albumSourceId: string; assetSourceIds: string[] }
  | { type: 'create-tag'; label: string }
  | { type: 'set-tag-assets'; label: string; assetSourceIds: string[] }
  | { type: 'delete-tag'; label: string }
);

export type MutationType = Mutation['type'];

export interface UnresolvedAsset {
  sourceId: string;
  filename: string | null;
  reason: string;
}

export interface MutationPlan {
  stages: Stage[];
  mutations: Mutation[];
  /** Local assets with no destination counterpart; nothing references them */
  unresolved: UnresolvedAsset[];
  /** Tag tombstones with nothing left to delete at the destination */
  purge: string[];
}

export type MutationStatus = 'applied' | 'failed' | 'blocked' | 'skipped';

export interface MutationOutcome {
  mutation: Mutation;
  status: MutationStatus;
  /** Failure cause, or why the mutation was blocked */
  reason?: string;
}

export interface ApplyResult {
  applied: number;
  failed: MutationOutcome[];
  blocked: MutationOutcome[];
  skipped: number;
  purged: string[];
  stopped: boolean;
  warnings: ReportWarning[];
}

export interface ReconcilerOptions {
  store: LocalStore;
  destination: DestinationApi;
  /** Domain of placeholder emails for users whose email is unknown */
  emailDomain: string;
  /** Initial password of created users */
  defaultPassword: string;
  /** Mutations in flight at once (default 4) */
  concurrency?: number;
  /** Destination asset lookups in flight at once while planning (default 4) */
  lookupConcurrency?: number;
}

export const DEFAULT_CONCURRENCY = 4;

const userKey = (sourceId: string) => `user:${sourceId}`;
const albumKey = (sourceId: string) => `album:${sourceId}`;
const assetKey = (sourceId: string) => `asset:${sourceId}`;
const tagKey = (label: string) => `tag:${label}`;

/** Mutation counts per type, in stage order */
export function summarizePlan(plan: MutationPlan): Array<[MutationType, number]> {
  const counts = new Map<MutationType, number>();
  for (const mutation of plan.mutations) {
    counts.set(mutation.type, (counts.get(mutation.type) ?? 0) + 1);
  }
  return [...counts.entries()];
}

/** True when applying the plan would change nothing, purges included */
export function planIsEmpty(plan: MutationPlan): boolean {
  return plan.mutations.length === 0 && plan.purge.length === 0;
}

/** Source id -> destination id, plus the create mutation when not created yet */
interface Resolution {
  destinationId: string | null;
  createdBy: string | null;
}

/**
 * Brings the destination in line with the local store.
 *
 * `plan()` never writes to the destination: it diffs each stored entity
 * against it through the id mappings and emits mutations for non-empty diffs
 * (lookups that find an asset or tag by name are kept as mappings). `apply()`
 * runs them stage by stage, writing each new destination id to the mappings
 * as soon as it exists so an interrupted apply resumes without duplicates.
 *
 * Events: 'mutation-applied', 'mutation-failed', 'mutation-blocked'.
 */
export class Reconciler extends EventEmitter {
  private readonly store: LocalStore;
  private readonly destination: DestinationApi;
  private readonly options: ReconcilerOptions;
  private shouldStop = false;

  constructor(options: ReconcilerOptions) {
    super();
    this.options = options;
    this.store = options.store;
    this.destination = options.destination;
  }

  requestStop(): void {
    this.shouldStop = true;
  }

  get stopRequested(): boolean {
    return this.shouldStop;
  }

  // ============================================
  // PLAN
  // ============================================

  async plan(options: { stages?: readonly Stage[] } = {}): Promise<MutationPlan> {
    const stages = STAGES.filter(stage => (options.stages ?? STAGES).includes(stage));
    const plan: MutationPlan = { stages, mutations: [], unresolved: [], purge: [] };
    const wants = (stage: Stage) => stages.includes(stage);

    const users = wants('users') || wants('albums') || wants('assets')
      ? await this.planUsers(plan, wants('users'))
      : new Map<string, Resolution>();

    const albums = wants('albums') || wants('album-assets')
      ? await this.planAlbums(plan, users, wants('albums'))
      : new Map<string, { resolution: Resolution; existing: DestinationAlbum | null }>();

    const assets = wants('assets') || wants('album-assets') || wants('tags')
      ? await this.resolveAssets(plan)
      : new Map<string, DestinationAsset>();

    if (wants('assets')) await this.planAssetOwners(plan, users, assets);
    if (wants('album-assets')) await this.planAlbumAssets(plan, albums, assets);
    if (wants('tags')) await this.planTags(plan, assets);

    log.info('reconciler', `Planned ${plan.mutations.length} mutation(s)`, {
      stages: stages.join(','),
      unresolved: plan.unresolved.length,
    });
    return plan;
  }

  private async planUsers(plan: MutationPlan, emit: boolean): Promise<Map<string, Resolution>> {
    const users = await this.store.query('user', { onlyForDestination: true });
    const existing = new Map((await this.destination.listUsers()).map(user => [user.id, user]));
    const mappings = await this.store.getMappings('user');
    const resolved = new Map<string, Resolution>();

    for (const user of users) {
      const mappedId = mappings.get(user.sourceId) ?? null;
      const current = mappedId ? existing.get(mappedId) : undefined;
      const email = this.desiredEmail(user);
      const name = user.destinationName ?? user.displayName;

      if (mappedId && current) {
        resolved.set(user.sourceId, { destinationId: mappedId, createdBy: null });
        const patch: { email?: string; name?: string } = {};
        if (current.email.toLowerCase() !== email.toLowerCase()) patch.email = email;
        if (current.name !== name) patch.name = name;
        if (emit && Object.keys(patch).length > 0) {
          plan.mutations.push({
            id: `update-user:${user.sourceId}`,
            stage: 'users',
            target: userKey(user.sourceId),
            dependsOn: [],
            type: 'update-user',
            userSourceId: user.sourceId,
            patch,
          });
        }
        continue;
      }

      if (mappedId) {
        log.warn('reconciler', 'Mapped user no longer exists at the destination', {
          sourceId: user.sourceId,
          destinationId: mappedId,
        });
      }
      if (!emit) continue;

      const id = `create-user:${user.sourceId}`;
      plan.mutations.push({
        id,
        stage: 'users',
        target: userKey(user.sourceId),
        dependsOn: [],
        type: 'create-user',
        userSourceId: user.sourceId,
        email,
        name,
      });
      resolved.set(user.sourceId, { destinationId: null, createdBy: id });
    }

    return resolved;
  }

  private desiredEmail(user: StoredUser): string {
    return user.destinationEmail ?? user.email ?? placeholderEmail(user.displayName, this.options.emailDomain);
  }

  private async planAlbums(
    plan: MutationPlan,
    users: Map<string, Resolution>,
    emit: boolean
  ): Promise<Map<string, { resolution: Resolution; existing: DestinationAlbum | null }>> {
    const albums = await this.store.query('album', {});
    const mappings = await this.store.getMappings('album');
    const resolved = new Map<string, { resolution: Resolution; existing: DestinationAlbum | null }>();

    for (const album of albums) {
      const mappedId = mappings.get(album.sourceId) ?? null;
      const current = mappedId ? await this.destination.getAlbum(mappedId) : null;
      if (mappedId && !current) {
        log.warn('reconciler', 'Mapped album no longer exists at the destination', {
          sourceId: album.sourceId,
          destinationId: mappedId,
        });
      }
      const owner = album.ownerSourceId ? users.get(album.ownerSourceId) ?? null : null;

      let createdBy: string | null = null;

      if (current && mappedId) {
        if (owner?.destinationId && owner.destinationId !== current.ownerId) {
          log.warn('reconciler', 'Album owner differs at the destination; adding the owner as a member', {
            album: album.title,
            expected: owner.destinationId,
            actual: current.ownerId,
          });
        }
        if (emit && current.albumName !== album.title) {
          plan.mutations.push({
            id: `update-album:${album.sourceId}`,
            stage: 'albums',
            target: albumKey(album.sourceId),
            dependsOn: [],
            type: 'update-album',
            albumSourceId: album.sourceId,
            patch: { albumName: album.title },
          });
        }
      } else if (emit) {
        createdBy = `create-album:${album.sourceId}`;
        plan.mutations.push({
          id: createdBy,
          stage: 'albums',
          target: albumKey(album.sourceId),
          dependsOn: owner?.createdBy ? [owner.createdBy] : [],
          type: 'create-album',
          albumSourceId: album.sourceId,
          albumName: album.title,
          ownerSourceId: owner && album.ownerSourceId ? album.ownerSourceId : null,
        });
      } else {
        continue;
      }

      resolved.set(album.sourceId, {
        resolution: { destinationId: current ? mappedId : null, createdBy },
        existing: current,
      });
      if (!emit) continue;

      // Members still missing at the destination; the owner counts as present
      const present = new Set(current ? [current.ownerId, ...current.memberIds] : []);
      const missing: string[] = [];
      const dependsOn = createdBy ? [createdBy] : [];
      for (const memberId of album.memberSourceIds) {
        const member = users.get(memberId);
        if (!member) continue;
        if (member.destinationId && present.has(member.destinationId)) continue;
        if (!current && memberId === album.ownerSourceId && owner) continue;
        missing.push(memberId);
        if (member.createdBy) dependsOn.push(member.createdBy);
      }

      if (missing.length > 0) {
        plan.mutations.push({
          id: `add-album-members:${album.sourceId}`,
          stage: 'albums',
          target: albumKey(album.sourceId),
          dependsOn,
          type: 'add-album-members',
          albumSourceId: album.sourceId,
          userSourceIds: missing,
        });
      }
    }

    return resolved;
  }

  /**
   * Destination asset of every stored asset: through the mapping, else by
   * filename and capture time. Matches found by search are remembered in the
   * mappings; assets that cannot be found go to `plan.unresolved`.
   */
  private async resolveAssets(plan: MutationPlan): Promise<Map<string, DestinationAsset>> {
    const assets = await this.store.query('asset', {});
    const mappings = await this.store.getMappings('asset');
    const resolved = new Map<string, DestinationAsset>();
    const limit = new Semaphore(this.options.lookupConcurrency ?? DEFAULT_CONCURRENCY);

    await Promise.all(assets.map(asset => limit.run(async () => {
      const found = await this.lookupAsset(asset, mappings.get(asset.sourceId) ?? null);
      if ('reason' in found) {
        plan.unresolved.push({ sourceId: asset.sourceId, filename: asset.filename, reason: found.reason });
        return;
      }
      resolved.set(asset.sourceId, found.asset);
    })));

    plan.unresolved.sort((a, b) => a.sourceId.localeCompare(b.sourceId));
    if (plan.unresolved.length > 0) {
      log.warn('reconciler', `${plan.unresolved.length} asset(s) not found at the destination`);
    }
    return resolved;
  }

  private async lookupAsset(
    asset: StoredAsset,
    mappedId: string | null
  ): Promise<{ asset: DestinationAsset } | { reason: string }> {
    if (mappedId) {
      const current = await this.destination.getAsset(mappedId);
      if (current) return { asset: current };
      log.warn('reconciler', 'Mapped asset no longer exists at the destination', { sourceId: asset.sourceId });
      await this.store.deleteMapping('asset', asset.sourceId);
    }

    if (!asset.filename) {
      return { reason: 'no filename was extracted' };
    }

    const match = await this.destination.findAsset({ filename: asset.filename, takenAt: asset.takenAt });
    if (!match) {
      return { reason: `no destination asset named ${asset.filename}${asset.takenAt ? ` near ${asset.takenAt}` : ''}` };
    }
    await this.store.setMapping('asset', asset.sourceId, match.id);
    return { asset: match };
  }

  private async planAssetOwners(
    plan: MutationPlan,
    users: Map<string, Resolution>,
    assets: Map<string, DestinationAsset>
  ): Promise<void> {
    const stored = await this.store.query('asset', { sourceIds: [...assets.keys()] });

    for (const asset of stored) {
      const current = assets.get(asset.sourceId);
      if (!current || !asset.ownerSourceId) continue;
      const owner = users.get(asset.ownerSourceId);
      if (!owner || owner.destinationId === current.ownerId) continue;

      plan.mutations.push({
        id: `reassign-asset-owner:${asset.sourceId}`,
        stage: 'assets',
        target: assetKey(asset.sourceId),
        dependsOn: owner.createdBy ? [owner.createdBy] : [],
        type: 'reassign-asset-owner',
        assetSourceId: asset.sourceId,
        ownerSourceId: asset.ownerSourceId,
      });
    }
  }

  private async planAlbumAssets(
    plan: MutationPlan,
    albums: Map<string, { resolution: Resolution; existing: DestinationAlbum | null }>,
    assets: Map<string, DestinationAsset>
  ): Promise<void> {
    for (const [albumSourceId, { resolution, existing }] of albums) {
      const links = await this.store.query('album-asset', { albumSourceId });
      const present = new Set(existing?.assetIds ?? []);
      const missing: string[] = [];

      for (const link of links) {
        const asset = assets.get(link.assetSourceId);
        if (!asset || present.has(asset.id)) continue;
        present.add(asset.id);
        missing.push(link.assetSourceId);
      }

      if (missing.length === 0) continue;
      plan.mutations.push({
        id: `add-album-assets:${albumSourceId}`,
        stage: 'album-assets',
        target: albumKey(albumSourceId),
        dependsOn: resolution.createdBy ? [resolution.createdBy] : [],
        type: 'add-album-assets',
        albumSourceId,
        assetSourceIds: missing,
      });
    }
  }

  private async planTags(plan: MutationPlan, assets: Map<string, DestinationAsset>): Promise<void> {
    const tags = await this.store.query('tag', { includeDeleted: true });
    const existing = await this.destination.listTags();
    const byId = new Map(existing.map(tag => [tag.id, tag]));
    const byName = new Map(existing.map(tag => [tag.name, tag]));
    const mappings = await this.store.getMappings('tag');

    for (const tag of tags) {
      const mappedId = mappings.get(tag.label);
      let current = mappedId ? byId.get(mappedId) : undefined;
      if (!current) {
        // Tag names are unique at the destination
        current = byName.get(tag.label);
        if (current) await this.store.setMapping('tag', tag.label, current.id);
      }

      if (tag.deletedAt) {
        if (current) {
          plan.mutations.push({
            id: `delete-tag:${tag.label}`,
            stage: 'tags',
            target: tagKey(tag.label),
            dependsOn: [],
            type: 'delete-tag',
            label: tag.label,
          });
        } else {
          plan.purge.push(tag.label);
        }
        continue;
      }

      const dependsOn: string[] = [];
      if (!current) {
        const id = `create-tag:${tag.label}`;
        plan.mutations.push({
          id,
          stage: 'tags',
          target: tagKey(tag.label),
          dependsOn: [],
          type: 'create-tag',
          label: tag.label,
        });
        dependsOn.push(id);
      }

      const tagged = new Set(current ? await this.destination.getTagAssets(current.id) : []);
      const missing = tag.assetSourceIds.filter(sourceId => {
        const asset = assets.get(sourceId);
        return asset !== undefined && !tagged.has(asset.id);
      });

      if (missing.length > 0) {
        plan.mutations.push({
          id: `set-tag-assets:${tag.label}`,
          stage: 'tags',
          target: tagKey(tag.label),
          dependsOn,
          type: 'set-tag-assets',
          label: tag.label,
          assetSourceIds: missing,
        });
      }
    }
  }

  // ============================================
  // APPLY
  // ============================================

  async apply(plan: MutationPlan, options: { concurrency?: number } = {}): Promise<ApplyResult> {
    const concurrency = options.concurrency ?? this.options.concurrency ?? DEFAULT_CONCURRENCY;
    const semaphore = new Semaphore(concurrency);
    const mutex = new KeyedMutex();
    const warnings = new WarningCollector();
    const outcomes = new Map<string, Promise<MutationOutcome>>();
    let fatal: unknown = null;

    for (const stage of plan.stages) {
      const mutations = plan.mutations.filter(mutation => mutation.stage === stage);
      if (mutations.length === 0) continue;
      log.info('reconciler', `Stage ${stage}: ${mutations.length} mutation(s)`);

      // Submitted in plan order; the key lock keeps that order per target
      for (const mutation of mutations) {
        outcomes.set(mutation.id, mutex.run(mutation.target, async () => {
          const dependencies = await Promise.all(
            mutation.dependsOn.flatMap(id => {
              const outcome = outcomes.get(id);
              return outcome ? [outcome] : [];
            })
          );
          if (this.shouldStop) {
            return this.settle({ mutation, status: 'skipped' });
          }
          const unmet = dependencies.find(dependency => dependency.status !== 'applied');
          if (unmet) {
            return this.settle({ mutation, status: 'blocked', reason: `${unmet.mutation.id} was ${unmet.status}` });
          }

          return semaphore.run(async () => {
            try {
              const blocked = await this.execute(mutation);
              if (blocked) return this.settle({ mutation, status: 'blocked', reason: blocked });
              return this.settle({ mutation, status: 'applied' });
            } catch (error) {
              warnings.add(error);
              await this.recordFailure(mutation, error);
              if (errorCategory(error) === 'fatal') {
                fatal ??= error;
                this.shouldStop = true;
              }
              return this.settle({ mutation, status: 'failed', reason: errorMessage(error) });
            }
          });
        }));
      }

      // Stages never overlap
      await Promise.all(mutations.map(mutation => outcomes.get(mutation.id)));
    }

    const settled = await Promise.all(plan.mutations.map(mutation => outcomes.get(mutation.id)));
    const results = settled.filter((outcome): outcome is MutationOutcome => outcome !== undefined);

    const purged: string[] = [];
    if (!this.shouldStop) {
      for (const label of plan.purge) {
        await this.store.purgeTag(label);
        purged.push(label);
      }
    }

    if (fatal) throw fatal;

    return {
      applied: results.filter(outcome => outcome.status === 'applied').length,
      failed: results.filter(outcome => outcome.status === 'failed'),
      blocked: results.filter(outcome => outcome.status === 'blocked'),
      skipped: results.filter(outcome => outcome.status === 'skipped').length,
      purged,
      stopped: this.shouldStop,
      warnings: warnings.list(),
    };
  }

  private settle(outcome: MutationOutcome): MutationOutcome {
    switch (outcome.status) {
      case 'applied':
        log.debug('reconciler', `Applied ${outcome.mutation.id}`);
        this.emit('mutation-applied', outcome);
        break;
      case 'failed':
        log.warn('reconciler', `Failed ${outcome.mutation.id}`, { reason: outcome.reason });
        this.emit('mutation-failed', outcome);
        break;
      case 'blocked':
        log.warn('reconciler', `Blocked ${outcome.mutation.id}`, { reason: outcome.reason });
        this.emit('mutation-blocked', outcome);
        break;
      case 'skipped':
        break;
    }
    return outcome;
  }

  private async recordFailure(mutation: Mutation, error: unknown): Promise<void> {
    const [entityKind = 'unknown', ...rest] = mutation.target.split(':');
    await this.store.recordError({
      runId: null,
      entityKind,
      entityId: rest.join(':'),
      operation: mutation.type,
      category: errorCategory(error) ?? 'unknown',
      message: errorMessage(error),
    });
  }

  /** Resolve through the mappings; null when the source entity has no destination id */
  private async resolve(kind: EntityKind, sourceId: string): Promise<string | null> {
    return this.store.getMapping(kind, sourceId);
  }

  private async resolveAll(kind: EntityKind, sourceIds: string[]): Promise<{ ids: string[]; missing: string[] }> {
    const ids: string[] = [];
    const missing: string[] = [];
    for (const sourceId of sourceIds) {
      const id = await this.resolve(kind, sourceId);
      if (id) ids.push(id);
      else missing.push(sourceId);
    }
    return { ids, missing };
  }

  /**
   * Run one mutation. Returns why it is blocked when a reference does not
   * resolve through the mappings, null once applied.
   */
  private async execute(mutation: Mutation): Promise<string | null> {
    switch (mutation.type) {
      case 'create-user': {
        const user = await this.destination.createUser({
          email: mutation.email,
          name: mutation.name,
          password: this.options.defaultPassword,
        });
        await this.store.setMapping('user', mutation.userSourceId, user.id);
        return null;
      }

      case 'update-user': {
        const id = await this.resolve('user', mutation.userSourceId);
        if (!id) return `user ${mutation.userSourceId} is not mapped`;
        await this.destination.updateUser(id, mutation.patch);
        return null;
      }

      case 'create-album': {
        let ownerId: string | undefined;
        if (mutation.ownerSourceId) {
          const resolved = await this.resolve('user', mutation.ownerSourceId);
          if (!resolved) return `owner ${mutation.ownerSourceId} is not mapped`;
          ownerId = resolved;
        }
        const album = await this.destination.createAlbum({
          albumName: mutation.albumName,
          ...(ownerId ? { ownerId } : {}),
        });
        await this.store.setMapping('album', mutation.albumSourceId, album.id);
        return null;
      }

      case 'update-album': {
        const id = await this.resolve('album', mutation.albumSourceId);
        if (!id) return `album ${mutation.albumSourceId} is not mapped`;
        await this.destination.updateAlbum(id, mutation.patch);
        return null;
      }

      case 'add-album-members': {
        const id = await this.resolve('album', mutation.albumSourceId);
        if (!id) return `album ${mutation.albumSourceId} is not mapped`;
        const { ids, missing } = await this.resolveAll('user', mutation.userSourceIds);
        if (missing.length > 0) return `member(s) not mapped: ${missing.join(', ')}`;
        await this.destination.addAlbumMembers(id, ids);
        return null;
      }

      case 'reassign-asset-owner': {
        const assetId = await this.resolve('asset', mutation.assetSourceId);
        if (!assetId) return `asset ${mutation.assetSourceId} is not mapped`;
        const ownerId = await this.resolve('user', mutation.ownerSourceId);
        if (!ownerId) return `owner ${mutation.ownerSourceId} is not mapped`;
        await this.destination.reassignAssetOwner(assetId, ownerId);
        return null;
      }

      case 'add-album-assets': {
        const id = await this.resolve('album', mutation.albumSourceId);
        if (!id) return `album ${mutation.albumSourceId} is not mapped`;
        const { ids, missing } = await this.resolveAll('asset', mutation.assetSourceIds);
        if (missing.length > 0) return `asset(s) not mapped: ${missing.join(', ')}`;
        const results = await this.destination.addAlbumAssets(id, ids);
        this.logBulkFailures(mutation, results);
        return null;
      }

      case 'create-tag': {
        const tag = await this.destination.createTag(mutation.label);
        await this.store.setMapping('tag', mutation.label, tag.id);
        return null;
      }

      case 'set-tag-assets': {
        const id = await this.resolve('tag', mutation.label);
        if (!id) return `tag ${mutation.label} is not mapped`;
        const { ids, missing } = await this.resolveAll('asset', mutation.assetSourceIds);
        if (missing.length > 0) return `asset(s) not mapped: ${missing.join(', ')}`;
        const results = await this.destination.setTags(id, ids);
        this.logBulkFailures(mutation, results);
        return null;
      }

      case 'delete-tag': {
        const id = await this.resolve('tag', mutation.label);
        if (!id) return `tag ${mutation.label} is not mapped`;
        await this.destination.deleteTag(id);
        await this.store.purgeTag(mutation.label);
        return null;
      }
    }
  }

  private logBulkFailures(mutation: Mutation, results: Array<{ id: string; success: boolean; error?: string | null }>): void {
    // "duplicate" means already present
    const rejected = results.filter(result => !result.success && result.error !== 'duplicate');
    if (rejected.length > 0) {
      log.warn('reconciler', `${mutation.id}: destination rejected ${rejected.length} asset(s)`, {
        errors: [...new Set(rejected.map(result => result.error ?? 'unknown'))].join(','),
      });
    }
  }
}
