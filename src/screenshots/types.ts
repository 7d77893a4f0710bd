export interface WindowInfo {
  application: string;
  window_title: string;
  pid: number;
}

export const UNKNOWN_WINDOW: WindowInfo = Object.freeze({ application: "Unknown", window_title: "Unknown", pid: 0 });

export interface ScreenshotSummary {
  id: number;
  timestamp: string;
  application: string;
  window_title: string | null;
  file_hash: string;
}

export interface ScreenshotQuery {
  limit?: number;
  application?: string;
  /** ISO date or date-time, inclusive. */
  startDate?: string;
  /** ISO date or date-time, inclusive; a bare date covers the whole day. */
  endDate?: string;
}

export interface ScreenshotStats {
  total_screenshots: number;
  /** `[application, count]`, most frequent first. */
  applications: Array<[string, number]>;
  date_range: [string | null, string | null];
}

/** Read side of the screenshot store used by game detection and chat. */
export interface ScreenshotHistory {
  getScreenshots(query?: ScreenshotQuery): ScreenshotSummary[];
  getStats(): ScreenshotStats;
}
