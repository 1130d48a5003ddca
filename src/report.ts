/**
 * Run report aggregation over PDF attempts.
 */

import type { PdfAttempt, PdfStats } from "./types.js";

/** Count attempts, successes split by access tier, and failures. */
export function summarizeAttempts(attempts: readonly PdfAttempt[]): PdfStats {
  const stats: PdfStats = {
    attempts: attempts.length,
    successes: 0,
    byOpenAccess: 0,
    byUniversityAccess: 0,
    failures: 0,
  };

  for (const attempt of attempts) {
    if (attempt.outcome.kind === "failure") {
      stats.failures++;
      continue;
    }
    stats.successes++;
    if (attempt.tier === "university_access") {
      stats.byUniversityAccess++;
    } else {
      stats.byOpenAccess++;
    }
  }

  return stats;
}

/**
 * Group failure messages across failed attempts, most frequent first.
 * Each record contributes its terminal reason plus one entry per failed source.
 */
export function summarizeFailures(attempts: readonly PdfAttempt[]): Array<{ reason: string; count: number }> {
  const counts = new Map<string, number>();

  for (const attempt of attempts) {
    if (attempt.outcome.kind !== "failure") continue;
    const reasons =
      attempt.failures.length > 0
        ? attempt.failures.map((f) => `${f.source}: ${f.error}`)
        : [attempt.outcome.reason];
    for (const reason of reasons) {
      counts.set(reason, (counts.get(reason) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([reason, count]) => ({ reason, count }))
    .sort((a, b) => b.count - a.count || a.reason.localeCompare(b.reason));
}
