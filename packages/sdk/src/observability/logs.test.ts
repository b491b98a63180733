import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "./logs.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should stay silent until enabled", () => {
    const write = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger();

    log.info("index.build.start", { drive: "docs" });
    expect(write).not.toHaveBeenCalled();

    log.setEnabled(true);
    log.info("index.build.start", { drive: "docs" });
    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toMatch(/\[INFO\] \[index\.build\.start\] drive=docs$/);
  });
});
