import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, MoreThanOrEqual, Repository } from 'typeorm';
import { LedgerRange, LedgerStore } from '../../ports/ledger-store.interface';
import { LedgerCell } from '../../domain/ledger/ledger-row.codec';
import { LedgerRowEntity } from '../persistence/ledger-row.entity';

/**
 * Local ledger with the same row numbering as the sheet: row 1 is the
 * header and bookings start at row 2.
 */
@Injectable()
export class SqliteLedgerStore implements LedgerStore {
  constructor(
    @InjectRepository(LedgerRowEntity)
    private readonly repository: Repository<LedgerRowEntity>,
  ) {}

  async ensureHeaderRow(columns: readonly string[]): Promise<void> {
    if ((await this.repository.count()) > 0) {
      return;
    }
    await this.repository.insert({ cells: [...columns] });
  }

  async appendRow(cells: LedgerCell[]): Promise<number> {
    // Keep row 1 for the header even if it was never written
    if ((await this.repository.count()) === 0) {
      await this.repository.insert({ cells: [] });
    }

    const result = await this.repository.insert({ cells });
    const rowIndex: unknown = result.identifiers[0]?.rowIndex;
    if (typeof rowIndex !== 'number') {
      throw new Error('Ledger insert returned no row index');
    }
    return rowIndex;
  }

  async readRows(range: LedgerRange): Promise<string[][]> {
    const rows = await this.repository.find({
      where: {
        rowIndex:
          range.endRow === undefined
            ? MoreThanOrEqual(range.startRow)
            : Between(range.startRow, range.endRow),
      },
      order: { rowIndex: 'ASC' },
    });

    return rows.map((row) => row.cells.map((cell) => String(cell)));
  }
}
