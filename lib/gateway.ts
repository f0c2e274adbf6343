import { GatewayState, Panel, ScanStats, Snapshot, createGatewayState } from './types/canonical';
import { EmptyPanelError } from './errors';
import { ScanOptions, scanAndLoad } from './ingestion/pipeline';
import { getUnifiedPanel } from './panel/panelBuilder';
import { computeQualityReport } from './validation/quality';
import { createSnapshot } from './storage/snapshotStore';

export interface PreprocessResult {
  state: GatewayState;
  stats: ScanStats;
  panel: Panel;
  snapshot: Snapshot;
}

/**
 * Scan a directory and build everything the snapshot carries.
 * Throws EmptyPanelError when no spot or futures file could be loaded.
 */
export async function preprocessDirectory(dir: string, options: ScanOptions = {}): Promise<PreprocessResult> {
  const state = createGatewayState();
  const stats = await scanAndLoad(state, dir, options);

  if (stats.spot_count === 0 && stats.futures_count === 0) {
    throw new EmptyPanelError();
  }

  const panel = getUnifiedPanel(state);
  // Report on the aligned spot, which is what the panel and snapshot carry
  state.quality = computeQualityReport(state.spot, state.contracts);
  const snapshot = createSnapshot(state, panel, stats);

  return { state, stats, panel, snapshot };
}
