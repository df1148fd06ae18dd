import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  FileArtifactSink,
  SinkUnavailableError,
  SqliteEventSink,
  TelemetryRecorder,
} from "../../runtime/src/index.js";
import { BrokenEventSink, MemoryEventSink, createLoggerMock } from "../helpers/fixtures.js";

const fixedNow = () => new Date("2026-04-01T08:30:00.000Z");

describe("SqliteEventSink", () => {
  let sink: SqliteEventSink;

  beforeEach(() => {
    sink = SqliteEventSink.create(":memory:", fixedNow);
  });

  afterEach(() => {
    sink.close();
  });

  it("records events with increasing ids", async () => {
    const first = await sink.record("PLAN", { goal: "g" });
    const second = await sink.record("DONE", { goal: "g" });

    expect(first).toEqual({ status: "success", id: 1, timestamp: "2026-04-01T08:30:00.000Z" });
    expect(second.id).toBe(2);
  });

  it("returns recent events newest first", async () => {
    await sink.record("PLAN", { goal: "g" });
    await sink.record("DONE", { goal: "g", ok: true });

    expect(await sink.recent(1)).toEqual([
      { id: 2, eventType: "DONE", details: { goal: "g", ok: true }, timestamp: "2026-04-01T08:30:00.000Z" },
    ]);
    expect((await sink.recent(10)).map((event) => event.eventType)).toEqual(["DONE", "PLAN"]);
  });

  it("reports writes after close as sink failures", async () => {
    sink.close();
    await expect(sink.record("PLAN", {})).rejects.toBeInstanceOf(SinkUnavailableError);
  });
});

describe("SqliteEventSink on disk", () => {
  it("creates the parent directory", async () => {
    const dir = mkdtempSync(join(tmpdir(), "conductor-test-events-"));
    try {
      const path = join(dir, "nested", "events.db");
      const sink = SqliteEventSink.create(path, fixedNow);
      await sink.record("PLAN", {});
      sink.close();

      expect(existsSync(path)).toBe(true);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("FileArtifactSink", () => {
  let root: string;
  let sink: FileArtifactSink;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "conductor-test-artifacts-"));
    sink = new FileArtifactSink(root, fixedNow);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("writes below the root and returns a receipt", async () => {
    const receipt = await sink.writeText("etl/results/1.json", '{"ok":true}');

    expect(readFileSync(join(root, "etl", "results", "1.json"), "utf-8")).toBe('{"ok":true}');
    expect(receipt.status).toBe("success");
    expect(receipt.size).toBe(11);
    expect(receipt.timestamp).toBe("2026-04-01T08:30:00.000Z");
    expect(receipt.uri.startsWith("file://")).toBe(true);
    expect(receipt.uri.endsWith("/etl/results/1.json")).toBe(true);
  });

  it("counts size in bytes", async () => {
    const receipt = await sink.writeText("note.txt", "héllo");
    expect(receipt.size).toBe(6);
  });

  it("accepts names that merely start with two dots", async () => {
    await sink.writeText("..notes/x.txt", "kept");
    expect(readFileSync(join(root, "..notes", "x.txt"), "utf-8")).toBe("kept");
  });

  it("refuses paths outside the root", async () => {
    await expect(sink.writeText("../escape.txt", "x")).rejects.toThrow(
      "Artifact path escapes the artifact root: ../escape.txt",
    );
    await expect(sink.writeText("/etc/passwd", "x")).rejects.toThrow(
      "Artifact path must be relative: /etc/passwd",
    );
    await expect(sink.writeText("  ", "x")).rejects.toThrow("Artifact path must not be empty");
  });
});

describe("TelemetryRecorder", () => {
  it("records without blocking the caller", async () => {
    const sink = new MemoryEventSink();
    const telemetry = new TelemetryRecorder(sink, createLoggerMock());

    telemetry.emit("RUN_STARTED", { goal: "g" });
    expect(telemetry.inFlight).toBe(1);
    await telemetry.flush();

    expect(sink.events.map((event) => event.eventType)).toEqual(["RUN_STARTED"]);
  });

  it("logs sink failures instead of throwing", async () => {
    const logger = createLoggerMock();
    const telemetry = new TelemetryRecorder(new BrokenEventSink(), logger);

    expect(() => telemetry.emit("RUN_STARTED", {})).not.toThrow();
    await telemetry.flush();

    expect(logger.warn).toHaveBeenCalledWith("Failed to record event", {
      eventType: "RUN_STARTED",
      error: "event store offline",
    });
  });

  it("returns a result from emitAndWait", async () => {
    const broken = await new TelemetryRecorder(new BrokenEventSink(), createLoggerMock()).emitAndWait(
      "HEALTH_CHECK",
      {},
    );
    expect(broken.ok).toBe(false);

    const missing = await new TelemetryRecorder(null, createLoggerMock()).emitAndWait("HEALTH_CHECK", {});
    expect(missing.ok).toBe(false);

    const healthy = await new TelemetryRecorder(new MemoryEventSink(), createLoggerMock()).emitAndWait(
      "HEALTH_CHECK",
      {},
    );
    expect(healthy.ok && healthy.value.id).toBe(1);
  });

  it("does nothing without a sink", async () => {
    const telemetry = new TelemetryRecorder(null, createLoggerMock());
    telemetry.emit("RUN_STARTED", {});
    expect(telemetry.inFlight).toBe(0);
    await telemetry.flush();
  });
});
