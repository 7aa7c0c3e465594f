/**
 * DailyStats
 *
 * Usage totals and peak speeds for one local calendar day.
 */

export interface DailyStats {
  /** Local calendar day, YYYY-MM-DD */
  date: string;
  /** Bytes uploaded during the day */
  totalUploaded: number;
  /** Bytes downloaded during the day */
  totalDownloaded: number;
  /** Highest upload speed published during the day, bytes/s */
  peakUploadSpeed: number;
  /** Highest download speed published during the day, bytes/s */
  peakDownloadSpeed: number;
}
