import { RunStatus, RunSummary } from "../types";

export interface RunStart {
  runId: string;
  startedAt: string;
  destinationUri: string;
  dryRun: boolean;
}

export interface RunFinish {
  status: Exclude<RunStatus, "running">;
  finishedAt: string;
  summary?: RunSummary;
  error?: string;
}

export interface RunRecord {
  runId: string;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus;
  destinationUri: string;
  dryRun: boolean;
  summary?: RunSummary;
  error?: string;
}

export interface RunStats {
  totalRuns: number;
  running: number;
  completed: number;
  failed: number;
  lastCompletedAt?: string;
}

export interface RunStore {
  startRun(run: RunStart): Promise<void>;
  finishRun(runId: string, result: RunFinish): Promise<void>;
  listRuns(limit: number): Promise<RunRecord[]>;
  getStats(): Promise<RunStats>;
  close(): Promise<void>;
}
