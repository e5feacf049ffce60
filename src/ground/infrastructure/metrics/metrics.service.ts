import { Injectable } from '@nestjs/common';
import { ExternalStore } from '../../domain/errors/reservation.errors';

export type RejectionReason = 'validation' | 'slot_taken' | 'court_locked';

@Injectable()
export class MetricsService {
  private reservationsCommitted = 0;
  private rejections: Record<RejectionReason, number> = {
    validation: 0,
    slot_taken: 0,
    court_locked: 0,
  };
  private storeFailures: Record<ExternalStore, number> = {
    calendar: 0,
    ledger: 0,
    notification: 0,
  };
  private conflictCheckFailures = 0;
  private compensationsCompleted = 0;
  private compensationsFailed = 0;
  private lockTimeouts = 0;

  // Arrays to store timing measurements
  private commitTimes: number[] = [];
  private lockWaitTimes: number[] = [];

  // Maximum samples to keep in memory (circular buffer approach)
  private readonly MAX_SAMPLES = 1000;

  /**
   * Resets all in-memory counters and samples.
   * Intended for test isolation since this service is stateful.
   */
  reset(): void {
    this.reservationsCommitted = 0;
    this.rejections = { validation: 0, slot_taken: 0, court_locked: 0 };
    this.storeFailures = { calendar: 0, ledger: 0, notification: 0 };
    this.conflictCheckFailures = 0;
    this.compensationsCompleted = 0;
    this.compensationsFailed = 0;
    this.lockTimeouts = 0;
    this.commitTimes = [];
    this.lockWaitTimes = [];
  }

  recordReservationCommitted(): void {
    this.reservationsCommitted++;
  }

  recordRejection(reason: RejectionReason): void {
    this.rejections[reason]++;
  }

  recordStoreFailure(store: ExternalStore): void {
    this.storeFailures[store]++;
  }

  recordConflictCheckFailure(): void {
    this.conflictCheckFailures++;
  }

  recordCompensation(outcome: 'completed' | 'failed'): void {
    if (outcome === 'completed') {
      this.compensationsCompleted++;
    } else {
      this.compensationsFailed++;
    }
  }

  recordCommitTime(ms: number): void {
    this.addSample(this.commitTimes, ms);
  }

  recordLockWaitTime(ms: number): void {
    this.addSample(this.lockWaitTimes, ms);
  }

  recordLockTimeout(): void {
    this.lockTimeouts++;
  }

  getMetrics(): {
    reservations: {
      committed: number;
      rejected: Record<RejectionReason, number>;
    };
    stores: {
      failures: Record<ExternalStore, number>;
      conflictCheckFailures: number;
      compensations: { completed: number; failed: number };
    };
    commitTime: {
      p95: number | null;
      samples: number;
    };
    locks: {
      waitTimes: {
        p95: number | null;
        samples: number;
      };
      timeouts: number;
    };
  } {
    return {
      reservations: {
        committed: this.reservationsCommitted,
        rejected: { ...this.rejections },
      },
      stores: {
        failures: { ...this.storeFailures },
        conflictCheckFailures: this.conflictCheckFailures,
        compensations: {
          completed: this.compensationsCompleted,
          failed: this.compensationsFailed,
        },
      },
      commitTime: {
        p95: this.calculateP95(this.commitTimes),
        samples: this.commitTimes.length,
      },
      locks: {
        waitTimes: {
          p95: this.calculateP95(this.lockWaitTimes),
          samples: this.lockWaitTimes.length,
        },
        timeouts: this.lockTimeouts,
      },
    };
  }

  private addSample(array: number[], value: number): void {
    array.push(value);
    if (array.length > this.MAX_SAMPLES) {
      array.shift();
    }
  }

  private calculateP95(values: number[]): number | null {
    if (values.length < 20) {
      // Insufficient data for reliable P95
      return null;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[index];
  }
}
