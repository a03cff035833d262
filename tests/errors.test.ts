import { describe, it, expect } from "vitest";
import {
  AlreadyExistsError,
  DuplicateKeyError,
  InvalidArgumentError,
  InvalidStateError,
  MigratorError,
  NotFoundError,
  httpStatusFor,
} from "../src/errors.js";

describe("httpStatusFor", () => {
  it("maps each error kind to its status", () => {
    expect(httpStatusFor(new InvalidArgumentError("x"))).toBe(400);
    expect(httpStatusFor(new InvalidStateError("x"))).toBe(400);
    expect(httpStatusFor(new NotFoundError("x"))).toBe(404);
    expect(httpStatusFor(new AlreadyExistsError("x"))).toBe(409);
    expect(httpStatusFor(new DuplicateKeyError("x"))).toBe(409);
  });

  it("treats anything else as 500", () => {
    expect(httpStatusFor(new Error("x"))).toBe(500);
    expect(httpStatusFor("x")).toBe(500);
  });
});

describe("MigratorError", () => {
  it("carries a code and keeps the subclass name", () => {
    const err = new DuplicateKeyError("Workload with IP 10.0.0.1 already exists");
    expect(err).toBeInstanceOf(MigratorError);
    expect(err.code).toBe("DUPLICATE_KEY");
    expect(err.name).toBe("DuplicateKeyError");
    expect(err.message).toBe("Workload with IP 10.0.0.1 already exists");
  });
});
