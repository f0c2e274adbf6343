import path from "path";

export const DATA_ROOT = process.env.DATA_ROOT || path.join(process.cwd(), "data");

export const SNAPSHOT_PATH = process.env.SNAPSHOT_PATH || "processed_data.json";

export const HEDGE_SUMMARY_PATH = process.env.HEDGE_SUMMARY_PATH || "hedge_analysis_summary.csv";
