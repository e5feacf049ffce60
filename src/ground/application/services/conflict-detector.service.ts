import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CalendarStore } from '../../ports/calendar-store.interface';
import { CALENDAR_STORE, GROUND_POLICY } from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import { ReservationRequest } from '../../domain/types/reservation-request.type';
import { AllConfigType } from '../../../config/config.type';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { withTimeout } from '../utils/with-timeout.util';
import { reservationWindow } from '../utils/reservation-window.util';

@Injectable()
export class ConflictDetectorService {
  private readonly timeoutMs: number;

  constructor(
    @Inject(CALENDAR_STORE)
    private readonly calendarStore: CalendarStore,
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    configService: ConfigService<AllConfigType>,
    private readonly logger: LoggerService,
    private readonly metricsService: MetricsService,
  ) {
    this.timeoutMs = configService.getOrThrow('ground.externalCallTimeoutMs', {
      infer: true,
    });
  }

  /**
   * True when the store returns any event for [start, end) that carries the
   * court id in its summary. The window itself is the store's query. The match is a case-sensitive substring test on
   * the event title, so it depends on titles being written as `[court] name`.
   *
   * A failed lookup answers "no conflict": bookings keep flowing while the
   * calendar is unreachable, at the price of a possible double-booking, which
   * is why every such failure is logged and counted.
   */
  async hasConflict(request: ReservationRequest): Promise<boolean> {
    const window = reservationWindow(request, this.policy.timezone);

    try {
      const events = await withTimeout(
        this.calendarStore.queryEvents(window, request.court),
        this.timeoutMs,
        'calendar.queryEvents',
      );

      return events.some((event) => event.summary.includes(request.court));
    } catch (error) {
      this.metricsService.recordConflictCheckFailure();
      this.logger.warn(
        'Conflict check failed, admitting request without it; double-booking possible',
        {
          court: request.court,
          date: request.date,
          startTime: request.startTime,
          endTime: request.endTime,
          err: error,
        },
      );
      return false;
    }
  }
}
