import { InvalidArgumentError, InvalidStateError } from "../errors.js";
import { Credentials } from "./credentials.js";
import { Storage } from "./storage.js";
import type { WorkloadRecord } from "./records.js";

/**
 * A machine: its IP (natural identifier), login credentials and storage.
 *
 * The IP is locked as soon as it is assigned. Since both the constructor
 * and fromRecord() assign it, every reachable Workload rejects a new IP.
 */
export class Workload {
  private _ip = "";
  private ipLocked = false;
  credentials: Credentials;
  storage: Storage;

  constructor(ip: string, credentials: Credentials, storage: Storage = new Storage()) {
    if (!ip) {
      throw new InvalidArgumentError("IP cannot be empty");
    }
    this.credentials = credentials;
    this.storage = storage;
    this.ip = ip;
  }

  get ip(): string {
    return this._ip;
  }

  set ip(value: string) {
    if (this.ipLocked) {
      throw new InvalidStateError(`IP address of workload ${this._ip} cannot be changed`);
    }
    if (!value) {
      throw new InvalidArgumentError("IP cannot be empty");
    }
    this._ip = value;
    this.ipLocked = true;
  }

  /** Deep copy: storage and mount points are not shared with the original. */
  clone(): Workload {
    return new Workload(this._ip, this.credentials, this.storage.clone());
  }

  equals(other: Workload): boolean {
    return (
      this._ip === other._ip &&
      this.credentials.equals(other.credentials) &&
      this.storage.equals(other.storage)
    );
  }

  toRecord(): WorkloadRecord {
    return {
      ip: this._ip,
      credentials: this.credentials.toRecord(),
      storage: this.storage.toRecord(),
    };
  }

  static fromRecord(record: WorkloadRecord): Workload {
    return new Workload(
      record.ip,
      Credentials.fromRecord(record.credentials),
      Storage.fromRecord(record.storage),
    );
  }
}
