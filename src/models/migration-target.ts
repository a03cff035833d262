import { Credentials } from "./credentials.js";
import { Workload } from "./workload.js";
import type { CloudType, MigrationTargetRecord } from "./records.js";

/** Cloud destination: provider, account credentials and the destination VM. */
export class MigrationTarget {
  readonly cloudType: CloudType;
  readonly cloudCredentials: Credentials;
  /** Storage is filled in by a successful migration run. */
  readonly targetVm: Workload;

  constructor(cloudType: CloudType, cloudCredentials: Credentials, targetVm: Workload) {
    this.cloudType = cloudType;
    this.cloudCredentials = cloudCredentials;
    this.targetVm = targetVm;
  }

  equals(other: MigrationTarget): boolean {
    return (
      this.cloudType === other.cloudType &&
      this.cloudCredentials.equals(other.cloudCredentials) &&
      this.targetVm.equals(other.targetVm)
    );
  }

  toRecord(): MigrationTargetRecord {
    return {
      cloud_type: this.cloudType,
      cloud_credentials: this.cloudCredentials.toRecord(),
      target_vm: this.targetVm.toRecord(),
    };
  }

  static fromRecord(record: MigrationTargetRecord): MigrationTarget {
    return new MigrationTarget(
      record.cloud_type,
      Credentials.fromRecord(record.cloud_credentials),
      Workload.fromRecord(record.target_vm),
    );
  }
}
