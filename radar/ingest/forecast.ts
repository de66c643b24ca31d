/**
 * Radar Composite CDN — Forecast Processing
 *
 * A forecast issuance arrives as one TAR bundle holding a composite per lead
 * time. Every (issuance, lead) pair renders as its own job; older issuances
 * are pruned only once the new one has published every lead it carries.
 */

import { mkdir, readdir, rm } from 'fs/promises';
import path from 'path';
import * as tar from 'tar';
import { CorruptDataError, FormatError, NetworkError, errorMessage, toRadarError } from '../errors';
import { createLogger, type Logger } from '../log';
import { parseCompactTimestamp, parseLeadLabel, renderKey } from '../naming';
import { minutesBetween } from '../time';
import { emptyStreamReport, type RenderedArtifact, type SourceFileId, type StreamCycleReport, type StreamId } from '../types';
import {
    hasFullArtifactSet,
    listArtifacts,
    settleOutcome,
    type StreamContext
} from './pipeline';
import { JobError, type RenderJob, type RenderJobResult } from './render-job';

// =============================================================================
// Bundle Extraction
// =============================================================================

export interface BundleExtractor {
    /** Extract the HDF5 members of `bundlePath` into `destDir`; returns their paths */
    extract(bundlePath: string, destDir: string): Promise<string[]>;
}

const MEMBER_SUFFIX = /\.(hdf|h5)$/i;

export class TarBundleExtractor implements BundleExtractor {
    async extract(bundlePath: string, destDir: string): Promise<string[]> {
        await mkdir(destDir, { recursive: true });
        try {
            await tar.x({
                file: bundlePath,
                cwd: destDir,
                strict: true,
                filter: (entryPath) => MEMBER_SUFFIX.test(entryPath)
            });
        } catch (error) {
            throw new CorruptDataError(`Cannot extract ${path.basename(bundlePath)}: ${errorMessage(error)}`, { cause: error });
        }

        const entries = await readdir(destDir, { recursive: true });
        return entries
            .filter((entry) => MEMBER_SUFFIX.test(entry))
            .map((entry) => path.join(destDir, entry))
            .sort();
    }
}

// =============================================================================
// Lead Times
// =============================================================================

/**
 * Lead of a bundle member in minutes. The member's own timestamp minus the
 * issuance time wins over its `_ftNN` label; a member whose lead cannot be
 * derived or is negative yields null.
 */
export function memberLeadMinutes(memberName: string, issuance: string, log?: Logger): number | null {
    const label = parseLeadLabel(memberName);
    const memberTime = parseCompactTimestamp(memberName);

    let lead: number;
    if (memberTime) {
        lead = minutesBetween(issuance, memberTime);
        if (label !== null && label !== lead) {
            log?.debug(`Forecast ${memberName} offset mismatch (timestamp delta ${lead}, label ${label})`);
        }
    } else if (label !== null) {
        lead = label;
    } else {
        log?.debug(`Skipping forecast ${memberName} (no timestamp or lead label)`);
        return null;
    }

    if (lead < 0) {
        log?.debug(`Skipping forecast ${memberName} (precedes issuance ${issuance})`);
        return null;
    }
    return lead;
}

export interface ForecastMember {
    id: SourceFileId;
    path: string;
}

type MemberStatus = 'published' | 'quarantined' | 'incomplete';

// =============================================================================
// Processor
// =============================================================================

export interface ForecastContext extends StreamContext {
    extractor?: BundleExtractor;
}

export class ForecastProcessor {
    readonly stream: StreamId = 'forecast';
    private readonly extractor: BundleExtractor;
    private readonly log: Logger;

    constructor(private readonly ctx: ForecastContext) {
        this.extractor = ctx.extractor ?? new TarBundleExtractor();
        this.log = ctx.logger ?? createLogger('forecast');
    }

    /**
     * Process the newest issuance in the listing if it is not done yet.
     */
    async runCycle(signal?: AbortSignal): Promise<StreamCycleReport> {
        const report = emptyStreamReport(this.stream);
        const listed = await this.ctx.downloader.listRemote(signal);
        const issuance = listed[0];

        if (!issuance) {
            this.log.debug('No forecast bundles available');
        } else if (this.ctx.manifest.isSettled(issuance.name)) {
            this.log.debug(`Latest bundle ${issuance.name} already handled`);
        } else {
            report.discovered = 1;
            await this.processIssuance(issuance, report, signal);
        }

        await this.forgetStale(listed);
        await this.persist();
        return report;
    }

    /**
     * Fetch, extract and render one issuance bundle.
     */
    async processIssuance(issuance: SourceFileId, report: StreamCycleReport, signal?: AbortSignal): Promise<void> {
        const bundleKey = renderKey(issuance);
        if (!this.ctx.registry.tryAcquire(bundleKey)) {
            report.skippedInFlight++;
            this.log.info(`Skipping ${issuance.name}: already in flight`);
            return;
        }

        try {
            let bundlePath: string;
            try {
                bundlePath = (await this.ctx.downloader.fetch(issuance, signal)).path;
            } catch (error) {
                const failure = new JobError('fetch', toRadarError(error, (m, cause) => new NetworkError(m, undefined, { cause })));
                settleOutcome(this.ctx, issuance, { status: 'failed', error: failure }, report, this.log);
                return;
            }

            let members: ForecastMember[];
            try {
                members = await this.extractMembers(issuance, bundlePath);
            } catch (error) {
                const failure = new JobError('decode', toRadarError(error, (m, cause) => new CorruptDataError(m, { cause })));
                settleOutcome(this.ctx, issuance, { status: 'failed', error: failure }, report, this.log);
                return;
            }

            const statuses = await Promise.all(members.map((m) => this.processMember(m, report, signal)));

            if (statuses.includes('incomplete')) {
                this.ctx.manifest.recordFailure(issuance, 'issuance partially published');
                this.log.warn(`Issuance ${issuance.name} incomplete, keeping previous forecasts`);
                return;
            }

            const leads = members.filter((_, i) => statuses[i] === 'published').map((m) => m.id.leadMinutes ?? 0);
            await rm(this.extractionDir(issuance), { recursive: true, force: true });
            if (leads.length === 0) {
                const error = new FormatError(`Every member of ${issuance.name} was quarantined`);
                this.log.warn(`Quarantining ${issuance.name}: ${error.message}`);
                this.ctx.manifest.quarantine(issuance, error);
                return;
            }

            this.ctx.manifest.markProcessed(issuance);
            report.processed++;
            report.pruned.push(...await this.pruneSuperseded(issuance.timestamp, leads));
            const skipped = members.length - leads.length;
            this.log.info(
                `Forecast bundle ${issuance.name} processed (${leads.length} leads` +
                (skipped > 0 ? `, ${skipped} quarantined)` : ')')
            );
        } finally {
            this.ctx.registry.release(bundleKey);
        }
    }

    /**
     * Artifacts of the newest issuance.
     */
    async latestArtifacts(): Promise<RenderedArtifact[]> {
        const artifacts = await listArtifacts(this.ctx.store, this.stream);
        if (artifacts.length === 0) return [];
        const newest = artifacts[0].timestamp;
        return artifacts.filter((a) => a.timestamp === newest);
    }

    /**
     * Delete prior-issuance artifacts for the leads the new issuance covers,
     * keeping `retainIssuances` prior issuances untouched.
     */
    async pruneSuperseded(issuance: string, leads: readonly number[]): Promise<string[]> {
        const covered = new Set(leads);
        const artifacts = await listArtifacts(this.ctx.store, this.stream);
        const prior = Array.from(new Set(artifacts.map((a) => a.timestamp))).filter((t) => t < issuance);
        const retained = new Set(prior.slice(0, this.ctx.config.forecast.retainIssuances));

        const removed: string[] = [];
        for (const artifact of artifacts) {
            if (artifact.timestamp >= issuance || retained.has(artifact.timestamp)) continue;
            if (artifact.leadMinutes === undefined || !covered.has(artifact.leadMinutes)) continue;
            await this.ctx.store.remove(artifact.key);
            removed.push(artifact.key);
        }
        if (removed.length > 0) {
            this.log.info(`Pruned ${removed.length} superseded forecast artifacts`);
        }
        return removed;
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private extractionDir(issuance: SourceFileId): string {
        return path.join(this.ctx.downloader.dataDir, issuance.name.replace(/\.tar$/i, ''));
    }

    private async extractMembers(issuance: SourceFileId, bundlePath: string): Promise<ForecastMember[]> {
        const files = await this.extractor.extract(bundlePath, this.extractionDir(issuance));
        const wanted = new Set(this.ctx.config.forecast.leadTimes);
        const byLead = new Map<number, ForecastMember>();

        for (const file of files) {
            const name = path.basename(file);
            const lead = memberLeadMinutes(name, issuance.timestamp, this.log);
            if (lead === null) continue;
            if (!wanted.has(lead)) {
                this.log.debug(`Skipping forecast ${name} (lead ${lead} not configured)`);
                continue;
            }
            if (byLead.has(lead)) {
                this.log.warn(`Duplicate member for lead ${lead} in ${issuance.name}, using ${name}`);
            }
            byLead.set(lead, {
                id: { stream: this.stream, name, timestamp: issuance.timestamp, leadMinutes: lead },
                path: file
            });
        }

        if (byLead.size === 0) {
            throw new FormatError(`Bundle ${issuance.name} holds no usable forecast members`);
        }
        return Array.from(byLead.values()).sort((a, b) => (a.id.leadMinutes ?? 0) - (b.id.leadMinutes ?? 0));
    }

    /**
     * A quarantined lead counts as settled: it is never decoded again and its
     * prior-issuance artifacts are left in place.
     */
    private async processMember(member: ForecastMember, report: StreamCycleReport, signal?: AbortSignal): Promise<MemberStatus> {
        const { id } = member;
        if (this.ctx.manifest.get(id.name)?.state === 'quarantined') {
            this.log.debug(`Forecast ${id.name} is quarantined, skipping`);
            return 'quarantined';
        }
        if (await hasFullArtifactSet(this.ctx.store, this.ctx.config, id.timestamp, id.leadMinutes)) {
            this.log.debug(`Forecast overlays already exist for lead ${id.leadMinutes}, skipping`);
            return 'published';
        }

        const key = renderKey(id);
        if (!this.ctx.registry.tryAcquire(key)) {
            report.skippedInFlight++;
            return 'incomplete';
        }
        try {
            if (signal?.aborted) {
                report.abandoned++;
                return 'incomplete';
            }
            const outcome = await this.ctx.pool.run<RenderJob, RenderJobResult>(
                { id, renderKey: key, sourcePath: member.path },
                this.ctx.handler
            );
            if (settleOutcome(this.ctx, id, outcome, report, this.log)) return 'published';
            return this.ctx.manifest.get(id.name)?.state === 'quarantined' ? 'quarantined' : 'incomplete';
        } finally {
            this.ctx.registry.release(key);
        }
    }

    /**
     * Drop manifest records and local bundles of issuances that left the
     * listing and no longer have published artifacts. Member records live as
     * long as their issuance.
     */
    private async forgetStale(listed: readonly SourceFileId[]): Promise<void> {
        const published = new Set((await listArtifacts(this.ctx.store, this.stream)).map((a) => a.timestamp));
        const live = new Set(listed.map((id) => id.timestamp));
        const dropped = this.ctx.manifest.retain((r) => live.has(r.id.timestamp) || published.has(r.id.timestamp));
        for (const record of dropped) {
            if (record.id.leadMinutes !== undefined) continue;
            await this.ctx.downloader.removeLocal(record.id.name);
            await rm(this.extractionDir(record.id), { recursive: true, force: true });
        }
    }

    private async persist(): Promise<void> {
        if (this.ctx.manifestPath) {
            await mkdir(path.dirname(this.ctx.manifestPath), { recursive: true });
            await this.ctx.manifest.save(this.ctx.manifestPath);
        }
    }
}
