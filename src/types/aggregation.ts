export type PageOutcome =
  | { kind: 'success'; page: number; pageSum: number }
  | { kind: 'failure'; page: number; reason: string };

export interface RunState {
  grandTotal: number;
  processedCount: number;
  failedPages: number[];  // completion order, diagnostic only
}

export interface Batch {
  number: number;      // 1-based
  pages: number[];
  chunks: number[][];
  workerCount: number;
}

export interface BatchProgress {
  batch: Batch;
  totalPages: number;
  state: Readonly<RunState>;
}

export interface AggregationResult {
  totalPages: number;
  grandTotal: number;
  processedCount: number;
  failedPages: number[];
  duration: number;
}

export type RunPhase = 'idle' | 'discovering' | 'scheduling' | 'dispatching' | 'folding' | 'gating' | 'succeeded' | 'failed';
