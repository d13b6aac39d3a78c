import { describe, it, expect } from "vitest";
import {
  SimulationError,
  ConfigError,
  OutOfBoundsError,
  CorruptSnapshotError,
  CollaboratorFailureError,
  TickInProgressError,
} from "./errors.js";

describe("error taxonomy", () => {
  it("ConfigError carries its code and offending layer", () => {
    const err = new ConfigError("bad layer", { layer: "arena" });
    expect(err).toBeInstanceOf(SimulationError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ConfigError");
    expect(err.code).toBe("CONFIG_ERROR");
    expect(err.data).toEqual({ layer: "arena" });
  });

  it("OutOfBoundsError names the coordinate and grid size", () => {
    const err = new OutOfBoundsError(5, -1, 3, 3);
    expect(err.code).toBe("OUT_OF_BOUNDS");
    expect(err.message).toBe("Tile (5, -1) is outside the 3x3 grid");
  });

  it("CorruptSnapshotError keeps the cause and store", () => {
    const cause = new Error("Unexpected token");
    const err = new CorruptSnapshotError("scratch", "/tmp/a/scratch.json", cause);
    expect(err.store).toBe("scratch");
    expect(err.cause).toBe(cause);
    expect(err.message).toBe("Failed to load scratch from /tmp/a/scratch.json: Unexpected token");
  });

  it("CollaboratorFailureError records the phase", () => {
    const err = new CollaboratorFailureError("planning", "Klaus", "model offline");
    expect(err.phase).toBe("planning");
    expect(err.code).toBe("COLLABORATOR_FAILURE");
    expect(err.message).toBe("Klaus: planning failed: model offline");
  });

  it("TickInProgressError has its own code", () => {
    expect(new TickInProgressError("Maria").code).toBe("TICK_IN_PROGRESS");
  });
});
