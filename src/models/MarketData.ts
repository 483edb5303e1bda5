/**
 * Market data and strategy signal models
 */

export interface Bar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Per-bar entry/exit flags aligned index-for-index with the bars they were generated from
 */
export interface Signal {
  entries: boolean[];
  exits: boolean[];
}
