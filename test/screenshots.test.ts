import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExecutionError, httpStatusFor, ValidationError } from "../src/errors.js";
import { parseProbeOutput, SystemWindowProbe, type ScreenGrabber, type WindowProbe } from "../src/screenshots/capture.js";
import { CaptureService } from "../src/screenshots/captureService.js";
import { Fernet } from "../src/screenshots/fernet.js";
import { ScreenshotStore } from "../src/screenshots/screenshotStore.js";
import { UNKNOWN_WINDOW, type WindowInfo } from "../src/screenshots/types.js";
import type { CommandRunner } from "../src/system/commandRunner.js";

const ELDEN_RING: WindowInfo = { application: "eldenring.exe", window_title: "ELDEN RING", pid: 4242 };
const BROWSER: WindowInfo = { application: "firefox", window_title: "Boss guide", pid: 77 };

describe("ScreenshotStore", () => {
  let clock: { current: Date };
  let store: ScreenshotStore;

  beforeEach(async () => {
    clock = { current: new Date("2026-03-01T10:00:00.000Z") };
    store = await ScreenshotStore.open({
      dbPath: ":memory:",
      cipher: new Fernet(Fernet.generateKey()),
      now: () => clock.current,
    });
  });

  afterEach(() => {
    store.close();
  });

  function saveAt(iso: string, image: string, window: WindowInfo): boolean {
    clock.current = new Date(iso);
    return store.saveScreenshot(Buffer.from(image), window);
  }

  it("stores encrypted frames and returns the original bytes", () => {
    expect(saveAt("2026-03-01T10:00:00.000Z", "frame-1", ELDEN_RING)).toBe(true);
    const [latest] = store.getScreenshots();
    expect(latest).toMatchObject({
      id: 1,
      timestamp: "2026-03-01T10:00:00.000Z",
      application: "eldenring.exe",
      window_title: "ELDEN RING",
    });
    expect(store.getScreenshotData(1)?.toString()).toBe("frame-1");
    expect(store.getScreenshotData(99)).toBeNull();
  });

  it("skips empty images and repeats of the previous frame", () => {
    expect(store.saveScreenshot(Buffer.alloc(0), ELDEN_RING)).toBe(false);
    expect(saveAt("2026-03-01T10:00:00.000Z", "frame-1", ELDEN_RING)).toBe(true);
    expect(saveAt("2026-03-01T10:00:30.000Z", "frame-1", ELDEN_RING)).toBe(false);
    expect(saveAt("2026-03-01T10:01:00.000Z", "frame-1", BROWSER)).toBe(true);
    expect(saveAt("2026-03-01T10:01:30.000Z", "frame-2", ELDEN_RING)).toBe(true);
    expect(saveAt("2026-03-01T10:02:00.000Z", "frame-1", ELDEN_RING)).toBe(true);
    expect(store.getStats().total_screenshots).toBe(4);
  });

  describe("queries", () => {
    beforeEach(() => {
      saveAt("2026-03-01T10:00:00.000Z", "a", ELDEN_RING);
      saveAt("2026-03-01T11:00:00.000Z", "b", BROWSER);
      saveAt("2026-03-05T10:00:00.000Z", "c", ELDEN_RING);
    });

    it("lists newest first with a limit", () => {
      expect(store.getScreenshots().map((shot) => shot.id)).toEqual([3, 2, 1]);
      expect(store.getScreenshots({ limit: 2 }).map((shot) => shot.id)).toEqual([3, 2]);
    });

    it("filters by application and date range", () => {
      expect(store.getScreenshots({ application: "eldenring.exe" }).map((shot) => shot.id)).toEqual([3, 1]);
      expect(store.getScreenshots({ startDate: "2026-03-01T10:30:00Z" }).map((shot) => shot.id)).toEqual([3, 2]);
      expect(store.getScreenshots({ endDate: "2026-03-02" }).map((shot) => shot.id)).toEqual([2, 1]);
    });

    it("rejects unparseable dates", () => {
      expect(() => store.getScreenshots({ endDate: "yesterday" })).toThrow(ValidationError);
      expect(() => store.getScreenshots({ endDate: "yesterday" })).toThrow(expect.objectContaining({ path: "$.endDate" }));
    });

    it("summarises the archive", () => {
      expect(store.getStats()).toEqual({
        total_screenshots: 3,
        applications: [
          ["eldenring.exe", 2],
          ["firefox", 1],
        ],
        date_range: ["2026-03-01T10:00:00.000Z", "2026-03-05T10:00:00.000Z"],
      });
    });

    it("deletes single screenshots", () => {
      expect(store.deleteScreenshot(2)).toBe(true);
      expect(store.deleteScreenshot(2)).toBe(false);
      expect(store.getScreenshots().map((shot) => shot.id)).toEqual([3, 1]);
    });
  });

  it("reports an empty archive", () => {
    expect(store.getStats()).toEqual({ total_screenshots: 0, applications: [], date_range: [null, null] });
  });
});

describe("ScreenshotStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "game-sage-shots-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reloads saved frames from the database file", async () => {
    const dbPath = path.join(dir, "nested", "screenshots.db");
    const cipher = new Fernet(Fernet.generateKey());
    const first = await ScreenshotStore.open({ dbPath, cipher });
    expect(first.saveScreenshot(Buffer.from("frame-1"), ELDEN_RING)).toBe(true);
    first.close();

    const reopened = await ScreenshotStore.open({ dbPath, cipher });
    expect(reopened.getStats().total_screenshots).toBe(1);
    expect(reopened.getScreenshotData(1)?.toString()).toBe("frame-1");
    reopened.close();
  });

  it("reports frames that no longer decrypt as a server fault", async () => {
    const dbPath = path.join(dir, "screenshots.db");
    const writer = await ScreenshotStore.open({ dbPath, cipher: new Fernet(Fernet.generateKey()) });
    writer.saveScreenshot(Buffer.from("frame-1"), ELDEN_RING);
    writer.close();

    const reader = await ScreenshotStore.open({ dbPath, cipher: new Fernet(Fernet.generateKey()) });
    let failure: unknown;
    try {
      reader.getScreenshotData(1);
    } catch (error) {
      failure = error;
    }
    reader.close();

    expect(failure).toBeInstanceOf(ExecutionError);
    expect(failure).toMatchObject({ kind: "execution", message: "Screenshot 1 could not be decrypted" });
    expect(httpStatusFor(failure)).toBe(500);
  });
});

describe("window probing", () => {
  it("parses pid, application and title lines", () => {
    expect(parseProbeOutput("4242\r\neldenring.exe\r\nELDEN RING\r\n")).toEqual(ELDEN_RING);
    expect(parseProbeOutput("")).toEqual({ application: "Unknown", window_title: "Unknown", pid: 0 });
  });

  it("asks xdotool and ps on Linux", async () => {
    const run: CommandRunner = async (binary, args) => {
      const command = [binary, ...args].join(" ");
      const outputs: Record<string, string> = {
        "xdotool getactivewindow getwindowname": "ELDEN RING\n",
        "xdotool getactivewindow getwindowpid": "4242\n",
        "ps -p 4242 -o comm=": "eldenring.exe\n",
      };
      return { command, exitCode: 0, stdout: outputs[command] ?? "", stderr: "" };
    };
    expect(await new SystemWindowProbe("linux", run).activeWindow()).toEqual(ELDEN_RING);
  });

  it("falls back to an unknown window when the probe fails", async () => {
    const run: CommandRunner = async () => {
      throw new Error("spawn osascript ENOENT");
    };
    expect(await new SystemWindowProbe("darwin", run).activeWindow()).toEqual(UNKNOWN_WINDOW);
  });
});

class RecordingSink {
  readonly saved: WindowInfo[] = [];

  saveScreenshot(_image: Buffer, windowInfo: WindowInfo): boolean {
    this.saved.push(windowInfo);
    return true;
  }
}

class StaticGrabber implements ScreenGrabber {
  failure: Error | null = null;

  async grab(): Promise<Buffer> {
    if (this.failure) throw this.failure;
    return Buffer.from("png");
  }
}

const probe: WindowProbe = { activeWindow: async () => ELDEN_RING };

describe("CaptureService", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("captures immediately and then on every interval", async () => {
    const sink = new RecordingSink();
    const service = new CaptureService({ store: sink, grabber: new StaticGrabber(), probe });

    service.start(10);
    await service.idle();
    expect(sink.saved).toEqual([ELDEN_RING]);
    expect(service.isRunning()).toBe(true);
    expect(service.interval).toBe(10);

    vi.advanceTimersByTime(10_000);
    await service.idle();
    expect(sink.saved).toHaveLength(2);

    service.stop();
    vi.advanceTimersByTime(30_000);
    await service.idle();
    expect(service.isRunning()).toBe(false);
    expect(sink.saved).toHaveLength(2);
  });

  it("only reschedules when started again while running", async () => {
    const sink = new RecordingSink();
    const service = new CaptureService({ store: sink, grabber: new StaticGrabber(), probe });

    service.start(10);
    await service.idle();
    service.start(5);
    await service.idle();
    expect(sink.saved).toHaveLength(1);

    vi.advanceTimersByTime(5_000);
    await service.idle();
    expect(sink.saved).toHaveLength(2);
    service.stop();
  });

  it("keeps running after a failed capture", async () => {
    const sink = new RecordingSink();
    const grabber = new StaticGrabber();
    grabber.failure = new Error("no display");
    const service = new CaptureService({ store: sink, grabber, probe });

    service.start(1);
    await service.idle();
    expect(sink.saved).toEqual([]);
    expect(service.isRunning()).toBe(true);

    grabber.failure = null;
    vi.advanceTimersByTime(1_000);
    await service.idle();
    expect(sink.saved).toHaveLength(1);
    service.stop();
  });

  it("rejects a non-positive interval", () => {
    const service = new CaptureService({ store: new RecordingSink(), grabber: new StaticGrabber(), probe });
    expect(() => service.start(0)).toThrow(RangeError);
    expect(service.isRunning()).toBe(false);
  });
});
