export type CellValue = string | number | null;

/** One file as loaded, before classification. */
export interface RawTable {
  filename: string;
  columns: string[];
  rows: Record<string, CellValue>[];
}

export type CanonicalField = 'date' | 'price' | 'open_interest' | 'volume';

export type SeriesKind = 'spot' | 'futures';

export type Classification = SeriesKind | 'unknown';

export interface NormalizedSeries {
  date: string[];                       // YYYY-MM-DD, strictly increasing
  price: (number | null)[];
  open_interest?: (number | null)[];
  volume?: (number | null)[];
}

export interface ContractRecord {
  id: string;
  series: NormalizedSeries;
}

export type PanelColumnKind = 'spot' | 'futures' | 'basis';

export interface PanelColumn {
  name: string;
  kind: PanelColumnKind;
  contract?: string;
  values: (number | null)[];
}

export interface Panel {
  dates: string[];
  columns: PanelColumn[];
}

export interface DateRange {
  start: string;
  end: string;
}

export interface SeriesQuality {
  total_records: number;
  valid_records: number;
  completeness: number;                 // 0..1
  date_range: DateRange | null;
}

export interface QualityReport {
  scan_time: string;
  spot: SeriesQuality | null;
  futures: Record<string, SeriesQuality>;
}

export interface ContractSummary {
  start_date: string;
  end_date: string;
  trading_days: number;
  avg_oi: number | null;
  max_oi: number | null;
  avg_volume: number | null;
}

export interface SpotSummary {
  start_date: string;
  end_date: string;
  trading_days: number;
  avg_price: number | null;
}

export interface ContractInfo {
  contracts: Record<string, ContractSummary>;
  spot: SpotSummary | null;
}

export interface ScanError {
  file: string;
  code: string;
  message: string;
}

export interface ScanStats {
  files: number;
  spot_count: number;
  futures_count: number;
  errors: ScanError[];
}

/**
 * Working state of one ingestion session. The caller owns it and threads it through
 * scan, alignment and panel generation; treat it as frozen once the panel is built.
 */
export interface GatewayState {
  spot: NormalizedSeries | null;
  contracts: Map<string, ContractRecord>;
  quality: QualityReport | null;
}

export function createGatewayState(): GatewayState {
  return { spot: null, contracts: new Map(), quality: null };
}

export interface Snapshot {
  version: 1;
  created_at: string;
  panel: Panel;
  contract_info: ContractInfo;
  quality_report: QualityReport;
  stats: ScanStats;
  spot: NormalizedSeries | null;
  futures: Record<string, NormalizedSeries>;
}
