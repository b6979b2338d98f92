import type { LoadedPullRequest } from './types.js';

export interface Correlation {
  correlation: number;
  pValue: number;
}

/** Two dimensions compared against the same outcome. */
export interface PairedCorrelation {
  files: Correlation;
  changes: Correlation;
}

export interface InteractionCorrelation {
  participants: Correlation;
  comments: Correlation;
}

export interface AnalysisResults {
  /** Size vs. merge outcome. */
  RQ01: PairedCorrelation;
  /** Duration vs. merge outcome. */
  RQ02: Correlation;
  /** Description length vs. merge outcome. */
  RQ03: Correlation;
  /** Interactions vs. merge outcome. */
  RQ04: InteractionCorrelation;
  /** Size vs. review count. */
  RQ05: PairedCorrelation;
  RQ06: Correlation;
  RQ07: Correlation;
  RQ08: InteractionCorrelation;
}

export type SummaryRow = {
  'Research Question': string;
  Dimension: string;
  'Vs. Status': string;
  'Vs. Reviews': string;
};

// ── Statistics ───────────────────────────────────────────────────────────────

/** 1-based ranks; tied values share the average of their positions. */
export function rank(values: readonly number[]): number[] {
  const order = values.map((value, index) => ({ value, index })).sort((a, b) => a.value - b.value);
  const ranks: number[] = new Array<number>(values.length).fill(0);
  let start = 0;
  while (start < order.length) {
    let end = start;
    while (end + 1 < order.length && order[end + 1]?.value === order[start]?.value) end++;
    const shared = (start + end) / 2 + 1;
    for (const entry of order.slice(start, end + 1)) ranks[entry.index] = shared;
    start = end + 1;
  }
  return ranks;
}

export function pearson(x: readonly number[], y: readonly number[]): number {
  const n = Math.min(x.length, y.length);
  if (n === 0) return Number.NaN;
  const mean = (values: readonly number[]) => values.slice(0, n).reduce((sum, v) => sum + v, 0) / n;
  const mx = mean(x);
  const my = mean(y);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? 0) - mx;
    const dy = (y[i] ?? 0) - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return Number.NaN;
  return sxy / Math.sqrt(sxx * syy);
}

/**
 * Spearman rank correlation with a two-sided p-value from Student's t
 * distribution on n - 2 degrees of freedom. Both are `NaN` for fewer than
 * three pairs or when either side is constant.
 */
export function spearman(x: readonly number[], y: readonly number[]): Correlation {
  const n = Math.min(x.length, y.length);
  if (n < 3) return { correlation: Number.NaN, pValue: Number.NaN };

  const correlation = pearson(rank(x.slice(0, n)), rank(y.slice(0, n)));
  if (Number.isNaN(correlation)) return { correlation, pValue: Number.NaN };
  if (Math.abs(correlation) >= 1) return { correlation, pValue: 0 };

  const df = n - 2;
  const t2 = (correlation * correlation * df) / (1 - correlation * correlation);
  return { correlation, pValue: incompleteBeta(df / (df + t2), df / 2, 0.5) };
}

// Godfrey's Lanczos coefficients, g = 607/128.
const LANCZOS_G = 607 / 128;
const LANCZOS = [
  57.156235665862923517, -59.597960355475491248, 14.136097974741747174, -0.49191381609762019978,
  0.33994649984811888699e-4, 0.46523628927048575665e-4, -0.98374475304879564677e-4, 0.15808870322491248884e-3,
  -0.21026444172410488319e-3, 0.2174396181152126432e-3, -0.16431810653676389022e-3, 0.84418223983852743293e-4,
  -0.2619083840158140867e-4, 0.36899182659531622704e-5,
];

export function logGamma(z: number): number {
  if (z < 0.5) return Math.log(Math.PI / Math.sin(Math.PI * z)) - logGamma(1 - z);
  const shifted = z - 1;
  let sum = 0.99999999999999709182;
  LANCZOS.forEach((coefficient, i) => {
    sum += coefficient / (shifted + i + 1);
  });
  const t = shifted + LANCZOS_G + 0.5;
  return 0.5 * Math.log(2 * Math.PI) + (shifted + 0.5) * Math.log(t) - t + Math.log(sum);
}

/** Regularized incomplete beta function I_x(a, b). */
export function incompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;
  const front = Math.exp(logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x));
  // The continued fraction converges quickly only on this side of the mean.
  if (x < (a + 1) / (a + b + 2)) return (front * betaContinuedFraction(x, a, b)) / a;
  return 1 - (front * betaContinuedFraction(1 - x, b, a)) / b;
}

function betaContinuedFraction(x: number, a: number, b: number): number {
  const maxIterations = 300;
  const epsilon = 3e-14;
  const tiny = 1e-300;
  const clampTiny = (value: number) => (Math.abs(value) < tiny ? tiny : value);

  let c = 1;
  let d = 1 / clampTiny(1 - ((a + b) * x) / (a + 1));
  let h = d;
  for (let m = 1; m <= maxIterations; m++) {
    const m2 = 2 * m;
    let step = (m * (b - m) * x) / ((a - 1 + m2) * (a + m2));
    d = 1 / clampTiny(1 + step * d);
    c = clampTiny(1 + step / c);
    h *= d * c;

    step = (-(a + m) * (a + b + m) * x) / ((a + m2) * (a + 1 + m2));
    d = 1 / clampTiny(1 + step * d);
    c = clampTiny(1 + step / c);
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < epsilon) break;
  }
  return h;
}

// ── Research questions ───────────────────────────────────────────────────────

const merged = (pr: LoadedPullRequest) => (pr.state === 'MERGED' ? 1 : 0);
const reviews = (pr: LoadedPullRequest) => pr.reviews.totalCount;
const totalChanges = (pr: LoadedPullRequest) => pr.additions + pr.deletions;
const descriptionLength = (pr: LoadedPullRequest) => pr.bodyText.length;

function correlate(
  rows: readonly LoadedPullRequest[],
  dimension: (pr: LoadedPullRequest) => number,
  outcome: (pr: LoadedPullRequest) => number,
): Correlation {
  return spearman(rows.map(dimension), rows.map(outcome));
}

function against(rows: readonly LoadedPullRequest[], outcome: (pr: LoadedPullRequest) => number) {
  return {
    size: {
      files: correlate(rows, (pr) => pr.changedFiles, outcome),
      changes: correlate(rows, totalChanges, outcome),
    },
    duration: correlate(rows, (pr) => pr.durationHours, outcome),
    description: correlate(rows, descriptionLength, outcome),
    interactions: {
      participants: correlate(rows, (pr) => pr.participants.totalCount, outcome),
      comments: correlate(rows, (pr) => pr.comments.totalCount, outcome),
    },
  };
}

/** Run RQ01–RQ04 against the merge outcome and RQ05–RQ08 against the review count. */
export function analyzePullRequests(rows: readonly LoadedPullRequest[]): AnalysisResults {
  const status = against(rows, merged);
  const review = against(rows, reviews);
  return {
    RQ01: status.size,
    RQ02: status.duration,
    RQ03: status.description,
    RQ04: status.interactions,
    RQ05: review.size,
    RQ06: review.duration,
    RQ07: review.description,
    RQ08: review.interactions,
  };
}

export function formatCorrelation({ correlation, pValue }: Correlation): string {
  return `${correlation.toFixed(3)} (p=${pValue.toFixed(3)})`;
}

export function summarize(results: AnalysisResults): SummaryRow[] {
  const row = (question: string, dimension: string, status: Correlation, review: Correlation): SummaryRow => ({
    'Research Question': question,
    Dimension: dimension,
    'Vs. Status': formatCorrelation(status),
    'Vs. Reviews': formatCorrelation(review),
  });

  return [
    row('RQ01', 'Changed Files', results.RQ01.files, results.RQ05.files),
    row('RQ01', 'Total Changes', results.RQ01.changes, results.RQ05.changes),
    row('RQ02', 'Duration (hours)', results.RQ02, results.RQ06),
    row('RQ03', 'Description Length', results.RQ03, results.RQ07),
    row('RQ04', 'Participants', results.RQ04.participants, results.RQ08.participants),
    row('RQ04', 'Comments', results.RQ04.comments, results.RQ08.comments),
  ];
}
