/**
 * Radar Composite CDN — In-Flight Render Keys
 *
 * At most one job per render key at a time. A second request for a held key
 * is skipped, never queued: the running job will publish the same artifacts.
 */

export class InFlightRegistry {
    private held = new Set<string>();

    /**
     * Take the key if nobody holds it. Returns false when it is already held.
     */
    tryAcquire(key: string): boolean {
        if (this.held.has(key)) return false;
        this.held.add(key);
        return true;
    }

    release(key: string): void {
        this.held.delete(key);
    }

    get size(): number {
        return this.held.size;
    }
}
