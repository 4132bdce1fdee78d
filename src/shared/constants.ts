export const SEVERITY_HIGH_DIFF_PCT = 30;
export const REVIEW_DIFF_PCT = 20;
export const MIN_QUALIFICATION_DURATION_MS = 1;

export const BUDGET_MILLIONS_MIN = 1;
export const BUDGET_MILLIONS_MAX = 100;
export const BUDGET_ABSOLUTE_MIN = 500_000;
export const BUDGET_ABSOLUTE_MAX = 50_000_000;

export const ROOM_COUNT_MIN = 1;
export const ROOM_COUNT_MAX = 10;

export const MAX_MATCH_RESULTS = 3;

export const SCENARIO_HEADER = "x-scenario";
