/**
 * DiscrepancyLog — reconciliation errors awaiting operator review.
 *
 * Entries are append-only; resolving one attaches a resolution record
 * and keeps the entry. Ids are sequential ("disc-1", "disc-2", ...).
 */

import type { Identity, Timestamp } from "@bondline/types";
import type {
  Discrepancy,
  DiscrepancyFilter,
  ExportedDiscrepancies,
  NewDiscrepancy,
} from "./types.js";
import { TrackerError } from "./types.js";

export class DiscrepancyLog {
  private entries: Map<string, Discrepancy> = new Map();
  private counter = 0;

  record(input: NewDiscrepancy): Discrepancy {
    this.counter++;
    const discrepancy: Discrepancy = { ...input, id: `disc-${String(this.counter)}` };
    this.entries.set(discrepancy.id, discrepancy);
    return discrepancy;
  }

  get(id: string): Discrepancy {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new TrackerError("DISCREPANCY_NOT_FOUND", `Discrepancy '${id}' not found`);
    }
    return entry;
  }

  /** Entries in recording order. */
  list(filter: DiscrepancyFilter = "all"): readonly Discrepancy[] {
    const all = [...this.entries.values()];
    if (filter === "open") return all.filter((d) => d.resolution === undefined);
    if (filter === "resolved") return all.filter((d) => d.resolution !== undefined);
    return all;
  }

  get openCount(): number {
    return this.list("open").length;
  }

  resolve(id: string, resolvedBy: Identity, note: string, now: Timestamp): Discrepancy {
    const entry = this.get(id);
    if (entry.resolution) {
      throw new TrackerError(
        "ALREADY_RESOLVED",
        `Discrepancy '${id}' was resolved by '${entry.resolution.resolvedBy}'`,
      );
    }

    const resolved: Discrepancy = {
      ...entry,
      resolution: { resolvedBy, note, resolvedAt: now },
    };
    this.entries.set(id, resolved);
    return resolved;
  }

  // ─── Checkpoint / export ──────────────────────────────────────────────

  export(): ExportedDiscrepancies {
    return { entries: [...this.entries.values()], counter: this.counter };
  }

  import(data: ExportedDiscrepancies): void {
    const entries = new Map<string, Discrepancy>();
    for (const entry of data.entries) {
      if (entries.has(entry.id)) {
        throw new TrackerError("INVALID_SNAPSHOT", `Duplicate discrepancy id '${entry.id}'`);
      }
      entries.set(entry.id, entry);
    }
    if (data.counter < entries.size) {
      throw new TrackerError(
        "INVALID_SNAPSHOT",
        `Discrepancy counter ${String(data.counter)} is below the entry count ${String(entries.size)}`,
      );
    }
    this.entries = entries;
    this.counter = data.counter;
  }
}
