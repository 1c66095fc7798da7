/**
 * Stats Summary
 * Plain-text rendering of a snapshot for CLIs and API responses
 *
 * @example
 * formatSummary(snapshot);
 * // You ran 42km in total.
 * // Your top countries were:
 * // 1) Germany 30km
 * // 2) Netherlands 12km
 * // Your top cities were:
 * // 1) Berlin 25km
 * // 2) Amsterdam 12km
 * // 3) Other Germany 5km
 */

import type { Snapshot, TallyEntry } from "../types/stats.types.js";

function formatRanking(title: string, entries: readonly TallyEntry[], top: number): string[] {
  if (entries.length === 0) return [];

  return [
    title,
    ...entries
      .slice(0, top)
      .map((entry, i) => `${i + 1}) ${entry.label} ${Math.floor(entry.km)}km`),
  ];
}

/**
 * Render total distance and the top countries and cities
 *
 * Distances are truncated to whole kilometers.
 */
export function formatSummary(snapshot: Snapshot, top = 3): string {
  const lines = [`You ran ${Math.floor(snapshot.totalKm)}km in total.`];

  lines.push(...formatRanking("Your top countries were:", snapshot.countries, top));
  lines.push(...formatRanking("Your top cities were:", snapshot.cities, top));

  return lines.join("\n");
}

/**
 * One-line progress indicator, e.g. "[40/120] 33% - 812.4 km"
 */
export function formatProgress(snapshot: Snapshot): string {
  const percent =
    snapshot.total === 0 ? 100 : Math.round((snapshot.processed / snapshot.total) * 100);
  return `[${snapshot.processed}/${snapshot.total}] ${percent}% - ${snapshot.totalKm.toFixed(1)} km`;
}
