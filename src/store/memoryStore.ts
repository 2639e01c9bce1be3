import { RunFinish, RunRecord, RunStart, RunStats, RunStore } from "./types";

export class InMemoryStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();

  async startRun(run: RunStart): Promise<void> {
    this.runs.set(run.runId, {
      runId: run.runId,
      startedAt: run.startedAt,
      status: "running",
      destinationUri: run.destinationUri,
      dryRun: run.dryRun,
    });
  }

  async finishRun(runId: string, result: RunFinish): Promise<void> {
    const existing = this.runs.get(runId);
    if (!existing) {
      return;
    }
    this.runs.set(runId, {
      ...existing,
      status: result.status,
      finishedAt: result.finishedAt,
      summary: result.summary,
      error: result.error,
    });
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    return [...this.runs.values()]
      .sort((a, b) => (a.startedAt === b.startedAt ? b.runId.localeCompare(a.runId) : b.startedAt.localeCompare(a.startedAt)))
      .slice(0, limit);
  }

  async getStats(): Promise<RunStats> {
    const runs = [...this.runs.values()];
    const completedAt = runs
      .filter((run) => run.status === "completed" && run.finishedAt !== undefined)
      .map((run) => run.finishedAt ?? "")
      .sort();
    return {
      totalRuns: runs.length,
      running: runs.filter((run) => run.status === "running").length,
      completed: runs.filter((run) => run.status === "completed").length,
      failed: runs.filter((run) => run.status === "failed").length,
      lastCompletedAt: completedAt[completedAt.length - 1],
    };
  }

  async close(): Promise<void> {
    return;
  }
}
