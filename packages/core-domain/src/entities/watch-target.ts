export interface WatchTarget {
  /** Absolute, normalized folder path. */
  folder: string;
  /** Base names or globs, matched against the file name only. */
  patterns: string[];
  recursive: boolean;
  /**
   * Treat browser and file-manager copies of an exact pattern name
   * (`(1)report.pdf`, `report (1).pdf`, `report_copy.pdf`, `report-2.pdf`)
   * as new arrivals of that name.
   */
  downloadCopies: boolean;
}
