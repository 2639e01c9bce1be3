import { FilterSpec } from "../filter";
import { IndexSource, SourcePartition } from "./types";

export class InMemorySource implements IndexSource {
  private readonly partitions: Map<string, unknown[]>;

  constructor(partitions: Record<string, unknown[]>) {
    this.partitions = new Map(Object.entries(partitions));
  }

  describe(): string {
    return `memory:${this.partitions.size}`;
  }

  async listPartitions(_spec: FilterSpec): Promise<SourcePartition[]> {
    return [...this.partitions.entries()].map(([id, rows]) => ({
      id,
      scan: async function* () {
        yield* rows;
      },
    }));
  }
}
