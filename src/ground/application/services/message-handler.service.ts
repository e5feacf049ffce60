import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Extractor } from '../../ports/extractor.interface';
import { NotificationSink } from '../../ports/notification-sink.interface';
import {
  CLOCK,
  EXTRACTOR,
  GROUND_POLICY,
  NOTIFICATION_SINK,
} from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import {
  CommitFailure,
  ExternalStoreError,
  ExtractionError,
} from '../../domain/errors/reservation.errors';
import { Clock } from '../../domain/types/clock.type';
import { Confirmation } from '../../domain/types/confirmation.type';
import {
  ExtractionInput,
  ExtractionOutcome,
} from '../../domain/types/extraction.type';
import { Result, err, ok } from '../../domain/types/result.type';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { AllConfigType } from '../../../config/config.type';
import { MessageReply } from '../dto/message.dto';
import {
  cancelAcknowledgementText,
  confirmationText,
  conflictText,
  helpText,
  imageUnreadableText,
  monthlySummaryText,
  systemErrorText,
  todayListText,
  validationText,
} from '../messages/reply-text';
import { withTimeout } from '../utils/with-timeout.util';
import { LedgerQueryService } from './ledger-query.service';
import { ReservationCommitterService } from './reservation-committer.service';

const SUMMARY_COMMAND = /^\/summary\s+(\d{4})-(\d{1,2})$/;

/**
 * Entry point for free-form chat messages: staff commands are answered
 * directly, anything else goes through extraction and the commit pipeline.
 * Every path ends in reply text; nothing is thrown back to the gateway.
 */
@Injectable()
export class MessageHandlerService {
  private readonly timeoutMs: number;

  constructor(
    @Inject(EXTRACTOR)
    private readonly extractor: Extractor,
    @Inject(NOTIFICATION_SINK)
    private readonly notificationSink: NotificationSink,
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly reservationCommitterService: ReservationCommitterService,
    private readonly ledgerQueryService: LedgerQueryService,
    private readonly metricsService: MetricsService,
    private readonly logger: LoggerService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.timeoutMs = configService.getOrThrow('ground.externalCallTimeoutMs', {
      infer: true,
    });
  }

  async handleText(text: string): Promise<MessageReply> {
    const message = text.trim();
    const command = message.toLowerCase();

    if (command === '/list') {
      return this.listToday();
    }

    const summary = SUMMARY_COMMAND.exec(message);
    if (summary) {
      return this.summarize(Number(summary[1]), Number(summary[2]));
    }
    if (command.startsWith('/summary')) {
      return { kind: 'help', text: 'Usage: /summary YYYY-MM' };
    }

    if (command.startsWith('/cancel')) {
      const forwarded = await this.forwardCancelRequest(message);
      return forwarded.ok
        ? { kind: 'cancel_forwarded', text: cancelAcknowledgementText() }
        : { kind: 'failed', text: systemErrorText() };
    }

    if (command === '/help' || command === 'help') {
      return { kind: 'help', text: helpText(this.policy) };
    }

    return this.fromExtraction({ kind: 'text', text: message });
  }

  async handleImage(data: Buffer, mimeType: string): Promise<MessageReply> {
    return this.fromExtraction({ kind: 'image', data, mimeType });
  }

  /** Cancellation is staff work: the request is only passed along. */
  async forwardCancelRequest(
    text: string,
  ): Promise<Result<void, ExternalStoreError>> {
    try {
      await withTimeout(
        this.notificationSink.send({
          type: 'cancel_request',
          text,
          sentAt: this.clock.now(),
        }),
        this.timeoutMs,
        'notification.send',
      );
      return ok(undefined);
    } catch (error) {
      this.metricsService.recordStoreFailure('notification');
      this.logger.error('Cancel request could not be forwarded', error);
      return err(new ExternalStoreError('notification', 'send', error));
    }
  }

  replyForCommit(result: Result<Confirmation, CommitFailure>): MessageReply {
    if (result.ok) {
      return {
        kind: 'confirmed',
        text: confirmationText(result.value, this.policy),
      };
    }

    const failure = result.error;
    switch (failure.kind) {
      case 'validation':
        return { kind: 'rejected', text: validationText(failure) };
      case 'conflict':
        return { kind: 'rejected', text: conflictText(failure) };
      case 'external_store':
        return { kind: 'failed', text: systemErrorText() };
    }
  }

  private async fromExtraction(input: ExtractionInput): Promise<MessageReply> {
    const extracted = await this.extract(input);

    if (!extracted.ok) {
      this.logger.warn('Extraction failed, treating message as not a reservation', {
        input: input.kind,
        detail: extracted.error.message,
      });
    }

    if (!extracted.ok || !extracted.value.isReservation) {
      return input.kind === 'image'
        ? { kind: 'unreadable', text: imageUnreadableText() }
        : { kind: 'help', text: helpText(this.policy) };
    }

    const result = await this.reservationCommitterService.commit(
      extracted.value.candidate,
    );
    return this.replyForCommit(result);
  }

  private async extract(
    input: ExtractionInput,
  ): Promise<Result<ExtractionOutcome, ExtractionError>> {
    try {
      return await withTimeout(
        this.extractor.extract(input),
        this.timeoutMs,
        'extractor.extract',
      );
    } catch (error) {
      return err(new ExtractionError('Extraction did not complete', error));
    }
  }

  private async listToday(): Promise<MessageReply> {
    const listed = await this.ledgerQueryService.listToday();
    if (!listed.ok) {
      return { kind: 'failed', text: systemErrorText() };
    }
    return {
      kind: 'listing',
      text: todayListText(this.ledgerQueryService.today(), listed.value),
    };
  }

  private async summarize(year: number, month: number): Promise<MessageReply> {
    if (month < 1 || month > 12) {
      return { kind: 'help', text: 'Usage: /summary YYYY-MM' };
    }
    const summary = await this.ledgerQueryService.monthlySummary(year, month);
    if (!summary.ok) {
      return { kind: 'failed', text: systemErrorText() };
    }
    return { kind: 'summary', text: monthlySummaryText(summary.value) };
  }
}
