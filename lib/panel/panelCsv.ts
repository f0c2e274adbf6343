import Papa from 'papaparse';
import { Panel } from '../types/canonical';

const BOM = '\ufeff';

/** Panel as CSV: `date` then one column per panel column, absent cells left empty. */
export function panelToCsv(panel: Panel, { bom = true }: { bom?: boolean } = {}): string {
  const fields = ['date', ...panel.columns.map(c => c.name)];
  const data = panel.dates.map((date, i) => [date, ...panel.columns.map(c => c.values[i] ?? '')]);
  const csv = Papa.unparse({ fields, data }, { newline: '\n' });
  return bom ? BOM + csv : csv;
}

/** Sibling export path: processed_data.json -> processed_data_panel.csv */
export function panelCsvPathFor(snapshotPath: string): string {
  const stem = snapshotPath.replace(/\.[^./\\]+$/, '');
  return `${stem}_panel.csv`;
}
