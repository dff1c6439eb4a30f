export type TagCategory = "write" | "read" | "residual";

export type ResidualMode = "watchlist" | "all";

export type MalformedPolicy = "fail" | "skip";

export interface TagSets {
  write: string[];
  read: string[];
  residual: string[];
}

export interface TimingSample {
  tag: string;
  value: number;
  lineNumber: number;
}

export interface Accumulators {
  write: Map<string, number[]>;
  read: Map<string, number[]>;
  residual: Map<string, number[]>;
}

export interface TagAggregate {
  tag: string;
  count: number;
  sum: number;
}

export interface TimingSummary {
  inputPath: string;
  residualMode: ResidualMode;
  linesRead: number;
  linesSkipped: number;
  write: TagAggregate[];
  read: TagAggregate[];
  residual: TagAggregate[];
  // residual tags seen in the log but absent from the watch-list, first-seen order
  unseededResidual: TagAggregate[];
}
