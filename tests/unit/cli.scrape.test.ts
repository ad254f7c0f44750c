describe("scrape CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/errorEnvelope");
    const { wrapSinkFailure } = await import("../../src/application/scrape-place/scrape.error-handler");

    const error = wrapSinkFailure(
      Object.assign(new Error("read-only file system"), { detail: "secret payload" }),
      { target: "summary" }
    );

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "scrape.failed",
      name: "SinkWriteError",
      message: "Failed to write batch summary: read-only file system",
      code: "sink_write_failed",
      context: { target: "summary" }
    });
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("keeps only known context fields", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/errorEnvelope");

    const error = Object.assign(new Error("bad entry"), {
      name: "ConfigError",
      code: "config_invalid",
      context: { index: 2, outputName: "Cafe", url: "https://maps.example.test/?token=abc" }
    });

    expect(buildCliErrorEnvelope(error, false).context).toEqual({ index: 2, outputName: "Cafe" });
    expect(buildCliErrorEnvelope("plain failure", false)).toEqual({
      event: "scrape.failed",
      name: "Error",
      message: "plain failure"
    });
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/errorEnvelope");

    expect(isDebugMode({ DEBUG: "true" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toContain("Error: boom");
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const runBatchScrape = jest.fn().mockRejectedValue(Object.assign(new Error("No locations configured"), {
      name: "ConfigError",
      code: "config_invalid",
      context: {},
      cause: { huge: "do-not-print-this" }
    }));
    jest.doMock("../../src/composition/root", () => ({ runBatchScrape }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeScrapeCli } = await import("../../src/cli/scrape");
    await expect(executeScrapeCli()).rejects.toThrow("EXIT:1");

    expect(runBatchScrape).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(JSON.stringify({
      event: "scrape.failed",
      name: "ConfigError",
      message: "No locations configured",
      code: "config_invalid"
    }));
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("exits normally once the batch finishes", async () => {
    const runBatchScrape = jest.fn().mockResolvedValue({ entries: [] });
    jest.doMock("../../src/composition/root", () => ({ runBatchScrape }));
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeScrapeCli } = await import("../../src/cli/scrape");
    await expect(executeScrapeCli()).resolves.toBeUndefined();
    expect(exitSpy).not.toHaveBeenCalled();
  });
});
