/**
 * Roster Store
 *
 * Holds the current technician roster as a frozen snapshot. A refresh loads
 * into a new array and swaps the reference, so a run that already took the
 * snapshot keeps it until it finishes. A failed refresh leaves the previous
 * snapshot in place.
 */

import type { RosterSourceKind } from '../config';
import type { RosterSource, TechnicianRecord } from './sources';

export interface RosterStatus {
  loaded: boolean;
  technicianCount: number;
  lastLoadedAt: string | null;
  lastError: string | null;
  source: RosterSourceKind;
}

export class RosterStore {
  private snapshot: readonly TechnicianRecord[] = Object.freeze([]);
  private loaded = false;
  private lastLoadedAt: string | null = null;
  private lastError: string | null = null;
  private inFlight: Promise<readonly TechnicianRecord[]> | null = null;

  constructor(private readonly source: RosterSource) {}

  /**
   * Initial load. A failure is logged and recorded; the store starts empty.
   */
  async init(): Promise<RosterStatus> {
    try {
      await this.refresh();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`❌ Initial roster load failed: ${message}`);
    }
    return this.status();
  }

  currentRoster(): readonly TechnicianRecord[] {
    return this.snapshot;
  }

  /**
   * Reloads from the source. Concurrent callers share one load.
   */
  refresh(): Promise<readonly TechnicianRecord[]> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  status(): RosterStatus {
    return {
      loaded: this.loaded,
      technicianCount: this.snapshot.length,
      lastLoadedAt: this.lastLoadedAt,
      lastError: this.lastError,
      source: this.source.kind,
    };
  }

  private async load(): Promise<readonly TechnicianRecord[]> {
    try {
      const records = await this.source.load();
      const next = Object.freeze(records.map(record => Object.freeze({ ...record })));

      this.snapshot = next;
      this.loaded = true;
      this.lastLoadedAt = new Date().toISOString();
      this.lastError = null;

      console.log(`✅ Roster loaded from ${this.source.kind}: ${next.length} technicians`);
      return next;
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : String(error);
      console.error(`❌ Roster refresh failed (keeping ${this.snapshot.length} cached technicians): ${this.lastError}`);
      throw error;
    }
  }
}
