import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger } from "./logger.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with its scope", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("world").info("grid loaded", { width: 3 });
    expect(spy).toHaveBeenCalledWith("[world] grid loaded", { width: 3 });
  });

  it("passes an empty string when there is no data", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    new ConsoleLogger("world").warn("no spawn points");
    expect(spy).toHaveBeenCalledWith("[world] no spawn points", "");
  });

  it("sanitizes control characters in the scope", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    new ConsoleLogger("agent\nforged").error("boom");
    expect(spy).toHaveBeenCalledWith("[agent_forged] boom", "");
  });

  it("derives child scopes", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    new ConsoleLogger("agent").child("Isabella").debug("tick");
    expect(spy).toHaveBeenCalledWith("[agent:Isabella] tick", "");
  });
});
