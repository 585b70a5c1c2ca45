/** Ratios and absolute limits used to classify benchmark changes. */
export interface ThresholdConfig {
  /** Hard regression when latest exceeds baseline by this factor... */
  regressionRatio: number;
  /** ...and by more than this many seconds. */
  regressionAbsolute: number;
  /** Non-blocking slowdown warning above this ratio. */
  slowdownRatio: number;
  /** Speedup note below this ratio. */
  speedupRatio: number;
  /** Whole run fails when the mean ratio reaches this value. */
  meanRatio: number;
}

export interface GitHubConfig {
  apiUrl: string;
  /** `owner/repo`; falls back to GITHUB_REPOSITORY at the CLI boundary. */
  repository?: string;
  /** Media type sent in the Accept header. */
  accept: string;
}

export interface PerfCompareConfig {
  thresholds: ThresholdConfig;
  github: GitHubConfig;
}
