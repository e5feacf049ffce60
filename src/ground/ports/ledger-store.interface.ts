import { LedgerCell } from '../domain/ledger/ledger-row.codec';

/** 1-based, inclusive sheet rows. `endRow` omitted means "to the last row". */
export interface LedgerRange {
  startRow: number;
  endRow?: number;
}

export interface LedgerStore {
  ensureHeaderRow(columns: readonly string[]): Promise<void>;
  /** Returns the 1-based row index the cells were written to. */
  appendRow(cells: LedgerCell[]): Promise<number>;
  readRows(range: LedgerRange): Promise<string[][]>;
}

export const DATA_ROWS: LedgerRange = { startRow: 2 };
