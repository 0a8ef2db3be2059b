import { Injectable } from "@nestjs/common";
import type { AssetId, FeedEntry, ReporterId } from "@/common/types/oracle";

/**
 * Latest entry per (asset, reporter). A later submission overwrites the earlier one.
 * Callers always receive copies.
 */
@Injectable()
export class FeedEntryStore {
  private readonly entries = new Map<AssetId, Map<ReporterId, FeedEntry>>();

  upsert(entry: FeedEntry): void {
    let byReporter = this.entries.get(entry.assetId);
    if (!byReporter) {
      byReporter = new Map();
      this.entries.set(entry.assetId, byReporter);
    }
    byReporter.set(entry.reporterId, { ...entry });
  }

  get(assetId: AssetId, reporterId: ReporterId): FeedEntry | undefined {
    const entry = this.entries.get(assetId)?.get(reporterId);
    return entry ? { ...entry } : undefined;
  }

  /** Ordered by reporter id */
  entriesFor(assetId: AssetId): FeedEntry[] {
    const byReporter = this.entries.get(assetId);
    if (!byReporter) {
      return [];
    }
    return [...byReporter.values()]
      .map(entry => ({ ...entry }))
      .sort((a, b) => a.reporterId.localeCompare(b.reporterId));
  }

  countFor(assetId: AssetId): number {
    return this.entries.get(assetId)?.size ?? 0;
  }
}
