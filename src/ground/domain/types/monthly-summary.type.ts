export interface MonthlySummary {
  year: number;
  month: number;
  count: number;
  cancelledCount: number;
  totalFee: number;
}
