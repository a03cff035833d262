import { InvalidArgumentError } from "../errors.js";
import type { MountPointRecord } from "./records.js";

/** A named storage unit with a declared total size. Compared by value. */
export class MountPoint {
  readonly name: string;
  readonly totalSize: number;

  constructor(name: string, totalSize: number) {
    if (!name) {
      throw new InvalidArgumentError("Mount point name cannot be empty");
    }
    if (!Number.isInteger(totalSize) || totalSize < 0) {
      throw new InvalidArgumentError(
        `Total size of mount point ${name} must be a non-negative integer, got ${totalSize}`,
      );
    }
    this.name = name;
    this.totalSize = totalSize;
    Object.freeze(this);
  }

  equals(other: MountPoint): boolean {
    return this.name === other.name && this.totalSize === other.totalSize;
  }

  clone(): MountPoint {
    return new MountPoint(this.name, this.totalSize);
  }

  toRecord(): MountPointRecord {
    return { name: this.name, total_size: this.totalSize };
  }

  static fromRecord(record: MountPointRecord): MountPoint {
    return new MountPoint(record.name, record.total_size);
  }
}
