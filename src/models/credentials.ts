import { InvalidArgumentError } from "../errors.js";
import type { CredentialsRecord } from "./records.js";

/** Login credentials for a machine or a cloud account. Immutable. */
export class Credentials {
  readonly username: string;
  readonly password: string;
  readonly domain: string;

  constructor(username: string, password: string, domain = "") {
    if (!username || !password) {
      throw new InvalidArgumentError("Username and password cannot be empty");
    }
    this.username = username;
    this.password = password;
    this.domain = domain;
    Object.freeze(this);
  }

  equals(other: Credentials): boolean {
    return (
      this.username === other.username &&
      this.password === other.password &&
      this.domain === other.domain
    );
  }

  toRecord(): CredentialsRecord {
    return { username: this.username, password: this.password, domain: this.domain };
  }

  static fromRecord(record: CredentialsRecord): Credentials {
    return new Credentials(record.username, record.password, record.domain);
  }
}
