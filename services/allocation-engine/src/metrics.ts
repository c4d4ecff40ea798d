import type { OutputLine, ReconciliationMetrics } from "@dispatch/contracts";

export function emptyMetrics(): ReconciliationMetrics {
  return {
    totalRows: 0,
    totalUnmetQty: 0,
    dispatchableRows: 0,
    nonDispatchableRows: 0,
    totalAllocatedQty: 0,
    splitRequests: 0
  };
}

/**
 * Summary figures shown next to a dispatch plan. Pure: the same lines always
 * give the same metrics.
 */
export function summarizeLines(lines: readonly OutputLine[]): ReconciliationMetrics {
  const metrics = emptyMetrics();
  const linesPerRequest = new Map<number, number>();

  for (const line of lines) {
    metrics.totalRows += 1;
    metrics.totalUnmetQty += line.unmetQty;
    metrics.totalAllocatedQty += line.allocatedQty;
    if (line.dispatchable) metrics.dispatchableRows += 1;
    else metrics.nonDispatchableRows += 1;
    linesPerRequest.set(line.sourceRow, (linesPerRequest.get(line.sourceRow) ?? 0) + 1);
  }

  for (const count of linesPerRequest.values()) {
    if (count > 1) metrics.splitRequests += 1;
  }
  return metrics;
}
