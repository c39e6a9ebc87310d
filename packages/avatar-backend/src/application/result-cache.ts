// packages/avatar-backend/src/application/result-cache.ts
//
// Result reuse for identical submissions.
// - Fingerprint: backend identity + input bytes + effective options.
// - Only succeeded jobs are registered; the first one for a fingerprint wins.
// - Eviction is a pluggable policy (unbounded, lru, max-age).
// - Optional in-flight dedupe: a second submission that matches a job still
//   queued or running mirrors that job instead of generating again.
import { createHash, randomUUID } from 'node:crypto';

import { ValidationError } from '@avatar-studio/contracts';

import type { CacheConfig, CachePolicyName, GeneratorConfig } from '../config/env.js';
import type { JobEvent, JobEventBus } from '../domain/job-events.js';
import {
  type ArtifactRef,
  type JobError,
  type JobOptions,
  type JobRecord,
  isTerminal,
} from '../domain/job-model.js';
import type { JobRepository } from '../domain/job-repository.js';
import { backendIdentity } from '../generators/registry.js';
import type { Generator } from '../generators/types.js';
import type { ArtifactStore } from '../infrastructure/artifact-store.js';
import { createJobLogger, logger } from '../infrastructure/logger.js';
import { type CreateJobResponseDto, jobRecordToCreateResponse } from './job-dto.js';
import type { AvatarServices } from './services.js';
import {
  type SubmitJobDeps,
  type SubmitJobRequest,
  type ValidatedSubmission,
  enqueueSubmission,
  persistJobInputs,
  validateSubmitJobRequest,
} from './submit-job.js';

type Clock = () => Date;

const FINGERPRINT_VERSION = 'avatar-video:v1';

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export interface FingerprintInput {
  backend: string;
  backendConfig: Record<string, unknown>;
  image: Buffer;
  source: { kind: 'text'; text: string } | { kind: 'audio'; bytes: Buffer };
  options: Readonly<Record<string, unknown>>;
}

// computeFingerprint.declaration()
export function computeFingerprint(input: FingerprintInput): string {
  const hash = createHash('sha256');
  hash.update(`${FINGERPRINT_VERSION}\0`);
  hash.update(`backend\0${input.backend}`);
  hash.update(`\0backend-config\0${stableStringify(input.backendConfig)}`);
  hash.update('\0image\0');
  hash.update(input.image);
  hash.update(`\0${input.source.kind}\0`);
  hash.update(input.source.kind === 'text' ? Buffer.from(input.source.text, 'utf8') : input.source.bytes);
  hash.update(`\0options\0${stableStringify(input.options)}`);
  return hash.digest('hex');
}

/**
 * Options as the backend will see them, so `{}` and an explicit default share
 * a fingerprint. Options a backend rejects are hashed raw; such jobs fail and
 * are never registered.
 */
export function effectiveOptions(generator: Generator, options: JobOptions): JobOptions {
  try {
    return generator.resolveOptions(options);
  } catch (error) {
    if (error instanceof ValidationError) return options;
    throw error;
  }
}

export function fingerprintSubmission(
  generator: Generator,
  generatorConfig: GeneratorConfig,
  submission: ValidatedSubmission,
): string {
  const { source } = submission;
  return computeFingerprint({
    backend: generator.backend,
    backendConfig: backendIdentity(generatorConfig),
    image: submission.image.bytes,
    source: source.kind === 'text' ? { kind: 'text', text: source.text } : { kind: 'audio', bytes: source.bytes },
    options: effectiveOptions(generator, submission.options),
  });
}

export interface CacheEntry {
  readonly fingerprint: string;
  readonly jobId: string;
  readonly resultRef: ArtifactRef;
  readonly createdAt: Date;
  readonly lastAccessedAt: Date;
}

export interface CacheEvictionPolicy {
  readonly name: CachePolicyName;
  /** Fingerprints to drop, given every entry currently held. */
  select(entries: readonly CacheEntry[], now: Date): string[];
}

export const unboundedPolicy: CacheEvictionPolicy = {
  name: 'unbounded',
  select: () => [],
};

export function lruPolicy(maxEntries: number): CacheEvictionPolicy {
  return {
    name: 'lru',
    select(entries) {
      const excess = entries.length - maxEntries;
      if (excess <= 0) return [];
      return [...entries]
        .sort((a, b) => a.lastAccessedAt.getTime() - b.lastAccessedAt.getTime())
        .slice(0, excess)
        .map((entry) => entry.fingerprint);
    },
  };
}

export function maxAgePolicy(maxAgeMs: number): CacheEvictionPolicy {
  return {
    name: 'max-age',
    select(entries, now) {
      return entries
        .filter((entry) => now.getTime() - entry.createdAt.getTime() > maxAgeMs)
        .map((entry) => entry.fingerprint);
    },
  };
}

export function createEvictionPolicy(config: CacheConfig): CacheEvictionPolicy {
  switch (config.policy) {
    case 'unbounded':
      return unboundedPolicy;
    case 'lru':
      return lruPolicy(config.maxEntries);
    case 'max-age':
      return maxAgePolicy(config.maxAgeMs);
    default: {
      const unsupported: never = config.policy;
      throw new Error(`Unsupported cache policy: ${String(unsupported)}`);
    }
  }
}

export interface ResultCacheOptions {
  store: ArtifactStore;
  policy?: CacheEvictionPolicy;
  clock?: Clock;
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly store: ArtifactStore;
  private readonly policy: CacheEvictionPolicy;
  private readonly clock: Clock;

  constructor(options: ResultCacheOptions) {
    this.store = options.store;
    this.policy = options.policy ?? unboundedPolicy;
    this.clock = options.clock ?? (() => new Date());
  }

  get size(): number {
    return this.entries.size;
  }

  get policyName(): CachePolicyName {
    return this.policy.name;
  }

  /** Entry whose artifact still exists, or null; a hit counts as an access. */
  async lookup(fingerprint: string): Promise<CacheEntry | null> {
    this.evict();
    const entry = this.entries.get(fingerprint);
    if (!entry) return null;

    if (!(await this.store.exists(entry.resultRef))) {
      this.entries.delete(fingerprint);
      logger.warn('Cached result missing from storage; entry dropped', {
        event: 'cache_entry_dropped',
        jobId: entry.jobId,
        key: entry.resultRef.key,
      });
      return null;
    }

    const touched: CacheEntry = { ...entry, lastAccessedAt: this.clock() };
    this.entries.set(fingerprint, touched);
    return touched;
  }

  /** Records a succeeded job's result; an existing entry for the fingerprint is kept. */
  register(fingerprint: string, jobId: string, resultRef: ArtifactRef): CacheEntry {
    const existing = this.entries.get(fingerprint);
    if (existing) return existing;

    const now = this.clock();
    const entry: CacheEntry = { fingerprint, jobId, resultRef, createdAt: now, lastAccessedAt: now };
    this.entries.set(fingerprint, entry);
    this.evict();
    return entry;
  }

  evict(): string[] {
    const selected = this.policy.select([...this.entries.values()], this.clock());
    for (const fingerprint of selected) {
      this.entries.delete(fingerprint);
    }
    if (selected.length > 0) {
      logger.debug('Cache entries evicted', {
        event: 'cache_evicted',
        policy: this.policy.name,
        count: selected.length,
      });
    }
    return selected;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Links follower jobs to an identical leader that is still queued or running.
 * Followers are never scheduled; they copy the leader's state changes,
 * progress and result as the leader's events arrive.
 */
export class InFlightJoiner {
  private readonly leaders = new Map<string, string>();
  private readonly followers = new Map<string, Set<string>>();
  private readonly decisions = new Map<string, Promise<void>>();
  private readonly unsubscribe: () => void;

  constructor(
    private readonly repository: JobRepository,
    events: JobEventBus,
  ) {
    this.unsubscribe = events.subscribe((event) => this.onEvent(event), {
      types: ['job_state_changed', 'job_progress'],
    });
  }

  /** Id of a non-terminal leader for the fingerprint, or null. */
  leaderFor(fingerprint: string): string | null {
    const leaderId = this.leaders.get(fingerprint);
    if (leaderId === undefined) return null;
    const leader = this.repository.get(leaderId);
    if (!leader || isTerminal(leader.state)) {
      this.leaders.delete(fingerprint);
      return null;
    }
    return leaderId;
  }

  /**
   * Runs `decide` once every earlier decision for the same fingerprint has
   * settled, so a leader is tracked before the next identical submission looks.
   */
  async serialize<T>(fingerprint: string, decide: () => Promise<T>): Promise<T> {
    const previous = this.decisions.get(fingerprint) ?? Promise.resolve();
    const current = previous.then(decide);
    // The chain only orders decisions; `current` still rejects to its own caller.
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.decisions.set(fingerprint, settled);
    try {
      return await current;
    } finally {
      if (this.decisions.get(fingerprint) === settled) {
        this.decisions.delete(fingerprint);
      }
    }
  }

  track(fingerprint: string, leaderId: string): void {
    if (!this.leaders.has(fingerprint)) {
      this.leaders.set(fingerprint, leaderId);
    }
  }

  follow(followerId: string, leaderId: string): void {
    const set = this.followers.get(leaderId) ?? new Set<string>();
    set.add(followerId);
    this.followers.set(leaderId, set);

    const leader = this.repository.get(leaderId);
    if (leader) this.mirror(followerId, leader);
  }

  followerCount(leaderId: string): number {
    return this.followers.get(leaderId)?.size ?? 0;
  }

  close(): void {
    this.unsubscribe();
    this.leaders.clear();
    this.followers.clear();
    this.decisions.clear();
  }

  private onEvent(event: JobEvent): void {
    const leader = event.job;
    const set = this.followers.get(leader.id);
    if (set) {
      for (const followerId of set) {
        this.mirror(followerId, leader);
      }
    }
    if (isTerminal(leader.state)) {
      this.followers.delete(leader.id);
      if (leader.fingerprint !== null && this.leaders.get(leader.fingerprint) === leader.id) {
        this.leaders.delete(leader.fingerprint);
      }
    }
  }

  private mirror(followerId: string, leader: JobRecord): void {
    let follower = this.repository.get(followerId);
    if (!follower || isTerminal(follower.state)) return;

    if (leader.state === 'failed') {
      const error: JobError = leader.error ?? { kind: 'internal', message: 'Joined job failed' };
      this.repository.transition({
        id: followerId,
        expectedState: follower.state,
        nextState: 'failed',
        error,
      });
      return;
    }

    if (leader.state === 'queued') return;

    if (follower.state === 'queued') {
      follower = this.repository.transition({
        id: followerId,
        expectedState: 'queued',
        nextState: 'running',
        message: `Joined in-flight job ${leader.id}`,
      });
      if (!follower) return;
    }

    if (leader.state === 'running') {
      this.repository.reportProgress(followerId, leader.progress, leader.message ?? undefined);
      return;
    }

    if (leader.resultRef) {
      this.repository.transition({
        id: followerId,
        expectedState: 'running',
        nextState: 'succeeded',
        resultRef: leader.resultRef,
        message: 'Ready (joined in-flight job)',
      });
    }
  }
}

export type SubmitOrReuseDeps = SubmitJobDeps &
  Pick<AvatarServices, 'config' | 'cache' | 'joiner'>;

// submitOrReuse.declaration()
/**
 * Submission entry point used by the HTTP layer. With caching disabled this is
 * a plain submit; otherwise a hit yields an already succeeded job and, with
 * dedupe enabled, a match on an in-flight job yields a follower. Identical
 * submissions are decided one at a time while dedupe is on.
 */
export async function submitOrReuse(
  deps: SubmitOrReuseDeps,
  req: SubmitJobRequest,
): Promise<CreateJobResponseDto> {
  const submission = validateSubmitJobRequest(req);
  if (!deps.config.cache.enabled) {
    return enqueueSubmission(deps, submission, null);
  }

  const fingerprint = fingerprintSubmission(deps.generator, deps.config.generator, submission);

  const { joiner } = deps;
  if (!joiner) {
    return reuseOrEnqueue(deps, submission, fingerprint);
  }

  return joiner.serialize(fingerprint, async () => {
    const hit = await deps.cache.lookup(fingerprint);
    if (hit) return serveCacheHit(deps, submission, fingerprint, hit);

    const leaderId = joiner.leaderFor(fingerprint);
    if (leaderId) return joinLeader(deps, joiner, submission, fingerprint, leaderId);

    const created = await enqueueSubmission(deps, submission, fingerprint);
    joiner.track(fingerprint, created.job_id);
    return created;
  });
}

async function reuseOrEnqueue(
  deps: SubmitOrReuseDeps,
  submission: ValidatedSubmission,
  fingerprint: string,
): Promise<CreateJobResponseDto> {
  const hit = await deps.cache.lookup(fingerprint);
  if (hit) return serveCacheHit(deps, submission, fingerprint, hit);
  return enqueueSubmission(deps, submission, fingerprint);
}

async function serveCacheHit(
  deps: SubmitOrReuseDeps,
  submission: ValidatedSubmission,
  fingerprint: string,
  hit: CacheEntry,
): Promise<CreateJobResponseDto> {
  const jobId = randomUUID();
  const inputs = await persistJobInputs(deps.store, jobId, submission);
  const job = deps.repository.insertCompleted({
    id: jobId,
    generatorBackend: deps.generator.backend,
    inputs,
    fingerprint,
    resultRef: hit.resultRef,
  });
  await deps.store.writeJobMeta(job);
  createJobLogger(job.id).info('Served from result cache', {
    event: 'cache_hit',
    sourceJobId: hit.jobId,
  });
  return jobRecordToCreateResponse(job);
}

async function joinLeader(
  deps: SubmitOrReuseDeps,
  joiner: InFlightJoiner,
  submission: ValidatedSubmission,
  fingerprint: string,
  leaderId: string,
): Promise<CreateJobResponseDto> {
  const jobId = randomUUID();
  const inputs = await persistJobInputs(deps.store, jobId, submission);
  const follower = deps.repository.insert({
    id: jobId,
    generatorBackend: deps.generator.backend,
    inputs,
    fingerprint,
  });
  joiner.follow(follower.id, leaderId);
  createJobLogger(follower.id).info('Joined in-flight job', {
    event: 'inflight_joined',
    leaderJobId: leaderId,
  });
  return jobRecordToCreateResponse(deps.repository.get(follower.id) ?? follower);
}
