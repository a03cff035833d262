/**
 * Migration aggregate root and its run state machine.
 *
 * not_started → running → success | error
 *
 * run() is the only way to change state. The guard and the switch to
 * running happen in the synchronous part of run(), before its first
 * await, so two overlapping calls on one instance can never both pass
 * the guard.
 */

import { InvalidArgumentError, InvalidStateError } from "../errors.js";
import { timeOrderedId } from "../utils/id.js";
import { assertBootVolumeSelected } from "./boot-volume.js";
import { MigrationTarget } from "./migration-target.js";
import { MountPoint } from "./mount-point.js";
import { Storage } from "./storage.js";
import { Workload } from "./workload.js";
import type { MigrationRecord, MigrationState } from "./records.js";
import { isTerminalState } from "./records.js";

/** Longest delay a single Node timer holds; longer ones fire after 1 ms. */
const MAX_TIMER_MS = 2 ** 31 - 1;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wait `ms`, in timer-sized chunks when it exceeds one timer's range. */
async function wait(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await sleep(chunk);
    remaining -= chunk;
  } while (remaining > 0);
}

export interface MigrationParams {
  selectedMountPoints: readonly MountPoint[];
  /** Copied on construction; later edits to the caller's workload do not leak in. */
  source: Workload;
  migrationTarget: MigrationTarget;
  /** Restoring an existing migration. Generated when absent. */
  id?: string;
  state?: MigrationState;
  createdAt?: string;
}

export interface RunOptions {
  /** Called synchronously after every state change. */
  onTransition?: (state: MigrationState, migration: Migration) => void;
}

export class Migration {
  readonly id: string;
  readonly source: Workload;
  readonly migrationTarget: MigrationTarget;
  readonly createdAt: string;
  private selected: MountPoint[];
  private _state: MigrationState;

  constructor(params: MigrationParams) {
    assertBootVolumeSelected(params.source.storage.mountPoints, params.selectedMountPoints);
    this.id = params.id ?? timeOrderedId("mig");
    this.source = params.source.clone();
    this.migrationTarget = params.migrationTarget;
    this.selected = [...params.selectedMountPoints];
    this._state = params.state ?? "not_started";
    this.createdAt = params.createdAt ?? new Date().toISOString();
  }

  get state(): MigrationState {
    return this._state;
  }

  get selectedMountPoints(): readonly MountPoint[] {
    return this.selected;
  }

  /** True once the migration reached success or error. */
  get finished(): boolean {
    return isTerminalState(this._state);
  }

  /**
   * Replace the selection. Only allowed before the first run; the boot
   * volume rule is checked again.
   */
  selectMountPoints(mountPoints: readonly MountPoint[]): void {
    if (this._state !== "not_started") {
      throw new InvalidStateError(
        `Cannot modify migration ${this.id} in state ${this._state}`,
      );
    }
    assertBootVolumeSelected(this.source.storage.mountPoints, mountPoints);
    this.selected = [...mountPoints];
  }

  /**
   * Run the migration: wait `delayMs`, then copy every selected mount point
   * that exists in the source into a fresh storage on the target VM.
   * Selected names missing from the source are skipped.
   *
   * Resolves once the migration is in success. If the copy (or recording
   * the success) fails, the state becomes error and the promise rejects
   * with the failure.
   */
  async run(delayMs = 0, options: RunOptions = {}): Promise<void> {
    if (this._state === "running") {
      throw new InvalidStateError(`Migration ${this.id} is already running`);
    }
    if (isTerminalState(this._state)) {
      throw new InvalidStateError(
        `Migration ${this.id} already finished with state ${this._state}; create a new migration to retry`,
      );
    }
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new InvalidArgumentError(`Delay must be a non-negative number of milliseconds, got ${delayMs}`);
    }

    try {
      this.transition("running", options);
      await wait(delayMs);
      this.copySelectedMountPoints();
      this.transition("success", options);
    } catch (err) {
      this.transition("error", options);
      throw err;
    }
  }

  private copySelectedMountPoints(): void {
    const targetStorage = new Storage();
    for (const selected of this.selected) {
      const match = this.source.storage.find(selected.name);
      if (match) {
        targetStorage.add(match.clone());
      }
    }
    this.migrationTarget.targetVm.storage = targetStorage;
  }

  private transition(next: MigrationState, options: RunOptions): void {
    this._state = next;
    options.onTransition?.(next, this);
  }

  toRecord(): MigrationRecord {
    return {
      id: this.id,
      selected_mount_points: this.selected.map((mp) => mp.toRecord()),
      source: this.source.toRecord(),
      migration_target: this.migrationTarget.toRecord(),
      state: this._state,
      created_at: this.createdAt,
    };
  }

  static fromRecord(record: MigrationRecord): Migration {
    return new Migration({
      id: record.id,
      selectedMountPoints: record.selected_mount_points.map((mp) => MountPoint.fromRecord(mp)),
      source: Workload.fromRecord(record.source),
      migrationTarget: MigrationTarget.fromRecord(record.migration_target),
      state: record.state,
      createdAt: record.created_at,
    });
  }
}
