import { MountPoint } from "./mount-point.js";
import type { StorageRecord } from "./records.js";

/**
 * Ordered collection of mount points owned by a single workload.
 * Names are not required to be unique; find() returns the first match.
 */
export class Storage {
  private readonly entries: MountPoint[];

  constructor(mountPoints: readonly MountPoint[] = []) {
    this.entries = [...mountPoints];
  }

  get mountPoints(): readonly MountPoint[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  add(mountPoint: MountPoint): void {
    this.entries.push(mountPoint);
  }

  /** First mount point with exactly this name, or null. */
  find(name: string): MountPoint | null {
    return this.entries.find((mp) => mp.name === name) ?? null;
  }

  /** Deep copy: the clone shares no mount point with this storage. */
  clone(): Storage {
    return new Storage(this.entries.map((mp) => mp.clone()));
  }

  equals(other: Storage): boolean {
    if (this.entries.length !== other.entries.length) return false;
    return this.entries.every((mp, i) => mp.equals(other.entries[i]));
  }

  toRecord(): StorageRecord {
    return { mount_points: this.entries.map((mp) => mp.toRecord()) };
  }

  static fromRecord(record: StorageRecord): Storage {
    return new Storage(record.mount_points.map((mp) => MountPoint.fromRecord(mp)));
  }
}
