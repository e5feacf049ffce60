import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { LedgerCell } from '../../domain/ledger/ledger-row.codec';

/** One ledger line; `rowIndex` plays the part of the sheet row number. */
@Entity('ledger_rows')
export class LedgerRowEntity {
  @PrimaryGeneratedColumn()
  rowIndex!: number;

  @Column('simple-json')
  cells!: LedgerCell[];

  @CreateDateColumn()
  createdAt!: Date;
}
