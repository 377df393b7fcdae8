/**
 * One iteration's assignment of records to centroids.
 *
 * Entries are positional: entry i belongs to centroid i of the list the
 * partition was built from, so a partition always has one entry per
 * centroid, empty or not. Lookup by centroid goes through the canonical
 * value key, never object identity.
 */

import {
  centroidKey,
  centroidsEqual,
  type Centroid,
  type DataRecord,
} from '../core/feature-vector.js';

/** A centroid and the records assigned to it, in input order. */
export interface ClusterEntry {
  readonly centroid: Centroid;
  readonly records: readonly DataRecord[];
}

export class Partition implements Iterable<ClusterEntry> {
  private readonly entries: readonly ClusterEntry[];
  /** centroid key -> first entry position with that key */
  private readonly positions = new Map<string, number>();

  constructor(entries: readonly ClusterEntry[]) {
    this.entries = Object.freeze(
      entries.map((entry) =>
        Object.freeze({ centroid: entry.centroid, records: Object.freeze([...entry.records]) }),
      ),
    );

    this.entries.forEach((entry, i) => {
      const key = centroidKey(entry.centroid);
      if (!this.positions.has(key)) {
        this.positions.set(key, i);
      }
    });
  }

  /**
   * Build a partition from a centroid list and a per-position assignment.
   */
  static fromAssignments(
    centroids: readonly Centroid[],
    assignments: readonly (readonly DataRecord[])[],
  ): Partition {
    return new Partition(
      centroids.map((centroid, i) => ({ centroid, records: assignments[i] ?? [] })),
    );
  }

  /** Number of entries (k). */
  get size(): number {
    return this.entries.length;
  }

  /** Total number of assigned records across all entries. */
  get recordCount(): number {
    return this.entries.reduce((sum, entry) => sum + entry.records.length, 0);
  }

  /**
   * Records assigned to a centroid, looked up by value. When two positions
   * hold equal centroids the first one answers.
   */
  get(centroid: Centroid): readonly DataRecord[] | undefined {
    const position = this.positions.get(centroidKey(centroid));
    return position === undefined ? undefined : this.entries[position].records;
  }

  has(centroid: Centroid): boolean {
    return this.positions.has(centroidKey(centroid));
  }

  entryAt(position: number): ClusterEntry | undefined {
    return this.entries[position];
  }

  centroids(): Centroid[] {
    return this.entries.map((entry) => entry.centroid);
  }

  [Symbol.iterator](): Iterator<ClusterEntry> {
    return this.entries[Symbol.iterator]();
  }

  /**
   * Structural equality: same centroid values at every position and the
   * same record identifiers, in order, under each.
   */
  equals(other: Partition): boolean {
    if (other.size !== this.size) return false;

    for (let i = 0; i < this.entries.length; i++) {
      const mine = this.entries[i];
      const theirs = other.entries[i];

      if (!centroidsEqual(mine.centroid, theirs.centroid)) return false;
      if (mine.records.length !== theirs.records.length) return false;
      for (let j = 0; j < mine.records.length; j++) {
        if (mine.records[j].identifier !== theirs.records[j].identifier) return false;
      }
    }
    return true;
  }

  /**
   * Map view keyed by `centroidKey`. Equal centroids at several positions
   * collapse to the first one, matching `get`.
   */
  toMap(): Map<string, readonly DataRecord[]> {
    const map = new Map<string, readonly DataRecord[]>();
    for (const [key, position] of this.positions) {
      map.set(key, this.entries[position].records);
    }
    return map;
  }
}
