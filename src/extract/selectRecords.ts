import { FilterSpec, evaluateRecord, parseIndexRecord, projectRecord } from "../filter";
import { ExtractRecord, IndexRecord, RejectReason } from "../types";

export interface SelectHooks {
  onScanned?(): void;
  onMalformed?(reason: string, row: unknown): void;
  onRejected?(reason: RejectReason, record: IndexRecord): void;
}

/** Lazily validates, filters and projects raw index rows. */
export async function* selectRecords(
  rows: AsyncIterable<unknown> | Iterable<unknown>,
  spec: FilterSpec,
  hooks: SelectHooks = {},
): AsyncGenerator<ExtractRecord> {
  for await (const row of rows) {
    hooks.onScanned?.();
    const parsed = parseIndexRecord(row);
    if (!parsed.ok) {
      hooks.onMalformed?.(parsed.reason, row);
      continue;
    }

    const decision = evaluateRecord(spec, parsed.record);
    if (decision !== "match") {
      hooks.onRejected?.(decision, parsed.record);
      continue;
    }
    yield projectRecord(parsed.record);
  }
}
