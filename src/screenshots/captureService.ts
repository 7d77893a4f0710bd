import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import type { ScreenGrabber, WindowProbe } from "./capture.js";
import type { WindowInfo } from "./types.js";

export const DEFAULT_CAPTURE_INTERVAL_SEC = 30;

export interface ScreenshotSink {
  saveScreenshot(image: Buffer, windowInfo: WindowInfo): boolean;
}

export interface CaptureServiceOptions {
  store: ScreenshotSink;
  grabber: ScreenGrabber;
  probe: WindowProbe;
  intervalSec?: number;
  logger?: PrefixedLogger;
}

/** Periodic capture loop. A failed tick is logged and the loop carries on. */
export class CaptureService {
  private readonly store: ScreenshotSink;
  private readonly grabber: ScreenGrabber;
  private readonly probe: WindowProbe;
  private readonly log: PrefixedLogger;
  private intervalSec: number;
  private timer: NodeJS.Timeout | null = null;
  private inflight: Promise<boolean> | null = null;

  constructor(options: CaptureServiceOptions) {
    this.store = options.store;
    this.grabber = options.grabber;
    this.probe = options.probe;
    this.intervalSec = options.intervalSec ?? DEFAULT_CAPTURE_INTERVAL_SEC;
    this.log = options.logger ?? loggerFor("capture");
  }

  get interval(): number {
    return this.intervalSec;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Starts the loop with an immediate first capture. Calling it while running only updates the interval. */
  start(intervalSec: number = this.intervalSec): void {
    if (!(intervalSec > 0)) {
      throw new RangeError("Capture interval must be positive");
    }
    const changed = intervalSec !== this.intervalSec;
    this.intervalSec = intervalSec;

    if (this.timer) {
      if (changed) {
        this.schedule();
        this.log.info(`capture interval updated intervalSec=${intervalSec}`);
      }
      return;
    }

    this.schedule();
    this.log.info(`capture started intervalSec=${intervalSec}`);
    this.tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info("capture stopped");
  }

  async captureAndSave(): Promise<boolean> {
    const windowInfo = await this.probe.activeWindow();
    const image = await this.grabber.grab();
    return this.store.saveScreenshot(image, windowInfo);
  }

  /** Resolves once the capture currently in progress, if any, has finished. */
  async idle(): Promise<void> {
    await this.inflight;
  }

  private schedule(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = setInterval(() => this.tick(), this.intervalSec * 1000);
    this.timer.unref();
  }

  private tick(): void {
    if (this.inflight) {
      this.log.debug("capture skipped: previous capture still running");
      return;
    }
    this.inflight = this.captureAndSave()
      .catch((error: unknown) => {
        this.log.error(`capture failed error=${formatErrorMessage(error)}`);
        return false;
      })
      .finally(() => {
        this.inflight = null;
      });
  }
}
