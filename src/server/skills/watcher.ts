import fs from "node:fs";
import { logEvent } from "../log";
import { redactPath } from "./redact";

export type WatchHandle = {
  close(): void;
  on(event: "error", listener: (err: Error) => void): unknown;
};

export type WatchFactory = (
  root: string,
  listener: (eventType: string, filename: string | null) => void
) => WatchHandle;

export type ChangeWatcherOptions = {
  debounceMs?: number;
  watch?: WatchFactory;
};

const defaultWatch: WatchFactory = (root, listener) =>
  fs.watch(root, { recursive: true, persistent: false }, (eventType, filename) => {
    listener(eventType, filename === null ? null : String(filename));
  });

/**
 * Collapses bursts of filesystem events under a root into single `onChange`
 * calls. Runs never overlap: events during a run schedule one follow-up.
 */
export class ChangeWatcher {
  private readonly debounceMs: number;
  private readonly watchFactory: WatchFactory;
  private handle: WatchHandle | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private pending = false;
  private root: string | null = null;
  private onChange: (() => unknown) | null = null;

  constructor(options: ChangeWatcherOptions = {}) {
    this.debounceMs = Math.max(0, Math.floor(Number(options.debounceMs ?? 150)));
    this.watchFactory = options.watch ?? defaultWatch;
  }

  get active(): boolean {
    return this.handle !== null;
  }

  start(rootPath: string, onChange: () => unknown) {
    this.stop();
    this.root = rootPath;
    this.onChange = onChange;

    let handle: WatchHandle;
    try {
      handle = this.watchFactory(rootPath, (eventType, filename) => {
        logEvent("debug", "skills.watch.event", { eventType, filename });
        this.schedule();
      });
    } catch (err) {
      logEvent("error", "skills.watch.error", {
        root: redactPath(rootPath),
        error: err instanceof Error ? err.message : String(err),
      });
      return;
    }
    handle.on("error", (err) => {
      logEvent("error", "skills.watch.error", {
        root: redactPath(rootPath),
        error: err.message,
      });
    });
    this.handle = handle;
  }

  stop() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending = false;
    this.onChange = null;
    if (!this.handle) return;
    const handle = this.handle;
    this.handle = null;
    handle.close();
  }

  private schedule() {
    if (!this.handle) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.fire();
    }, this.debounceMs);
  }

  private async fire() {
    if (this.running) {
      this.pending = true;
      return;
    }
    const callback = this.onChange;
    if (!callback) return;

    this.running = true;
    try {
      await callback();
    } catch (err) {
      logEvent("error", "skills.watch.callback_failed", {
        root: this.root ? redactPath(this.root) : null,
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      this.running = false;
    }

    if (this.pending && this.handle) {
      this.pending = false;
      await this.fire();
    }
  }
}
