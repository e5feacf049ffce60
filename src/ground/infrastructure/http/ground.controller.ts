import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Inject,
  Post,
  Query,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { randomUUID } from 'crypto';
import { ZodError } from 'zod';
import { GROUND_POLICY } from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import { CommitFailure } from '../../domain/errors/reservation.errors';
import { Confirmation } from '../../domain/types/confirmation.type';
import { LedgerQueryService } from '../../application/services/ledger-query.service';
import { MessageHandlerService } from '../../application/services/message-handler.service';
import { ReservationCommitterService } from '../../application/services/reservation-committer.service';
import {
  ImageMessageRequest,
  ImageMessageSchema,
  MessageReply,
  TextMessageRequest,
  TextMessageSchema,
} from '../../application/dto/message.dto';
import {
  ConfirmationResponse,
  ReservationCandidateRequest,
  ReservationCandidateSchema,
} from '../../application/dto/reservation-candidate.dto';
import {
  MonthlySummaryQuery,
  MonthlySummaryQuerySchema,
} from '../../application/dto/monthly-summary.dto';
import {
  CancelRequest,
  CancelRequestSchema,
} from '../../application/dto/cancel-request.dto';
import {
  cancelAcknowledgementText,
  helpText,
  monthlySummaryText,
  todayListText,
} from '../../application/messages/reply-text';
import { LoggerService } from '../logging/logger.service';
import { MetricsService } from '../metrics/metrics.service';

// Helper function to get throttle limits based on environment.
// Tests run with much higher limits unless ENABLE_RATE_LIMITING=true.
const getThrottleConfig = (defaultLimit: number) => {
  const isTest = process.env.NODE_ENV === 'test';
  const relaxInTests = isTest && process.env.ENABLE_RATE_LIMITING !== 'true';
  return {
    default: {
      limit: relaxInTests ? 10000 : defaultLimit,
      ttl: 60000,
    },
  };
};

function asHttpError(error: unknown): unknown {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof ZodError) {
    return new BadRequestException({
      error: 'invalid_input',
      detail: error.errors,
    });
  }
  return error;
}

function commitFailureToHttp(
  failure: CommitFailure,
  reply: string,
): HttpException {
  switch (failure.kind) {
    case 'validation':
      return new UnprocessableEntityException({
        error: 'validation_failed',
        detail: {
          missingFields: failure.missingFields,
          invalidFields: failure.invalidFields,
        },
        reply,
      });
    case 'conflict':
      return new ConflictException({
        error: failure.reason,
        detail: failure.message,
        reply,
      });
    case 'external_store':
      return new ServiceUnavailableException({
        error: 'store_unavailable',
        detail: {
          store: failure.store,
          operation: failure.operation,
          compensation: failure.compensation,
        },
        reply,
      });
  }
}

function toConfirmationResponse(
  confirmation: Confirmation,
  reply: string,
): ConfirmationResponse {
  const { request, fee } = confirmation;
  return {
    reservationId: confirmation.reservationId,
    ledgerRowIndex: confirmation.ledgerRowIndex,
    calendarEventId: confirmation.calendarEventId,
    date: request.date,
    startTime: request.startTime,
    endTime: request.endTime,
    hours: request.hours,
    court: request.court,
    name: request.name,
    category: request.category,
    dayType: request.dayType,
    ratePerHour: fee.ratePerHour,
    total: fee.total,
    paymentMethod: fee.paymentMethod,
    trail: confirmation.trail,
    reply,
  };
}

@ApiTags('ground')
@Controller('ground')
export class GroundController {
  constructor(
    private readonly messageHandlerService: MessageHandlerService,
    private readonly reservationCommitterService: ReservationCommitterService,
    private readonly ledgerQueryService: LedgerQueryService,
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    private readonly logger: LoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  @Post('messages')
  @Throttle(getThrottleConfig(30))
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Handle a chat message and return the reply' })
  @ApiResponse({ status: 200, description: 'Reply text' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  async handleMessage(@Body() body: TextMessageRequest): Promise<MessageReply> {
    const requestId = randomUUID();
    const startTime = Date.now();

    try {
      const validated = TextMessageSchema.parse(body);
      const reply = await this.messageHandlerService.handleText(validated.text);

      this.logger.log({
        requestId,
        op: 'handle_message',
        durationMs: Date.now() - startTime,
        outcome: reply.kind,
      });

      return reply;
    } catch (error) {
      this.logger.error('Handle message failed', error, {
        requestId,
        durationMs: Date.now() - startTime,
        outcome: 'error',
        op: 'handle_message',
      });
      throw asHttpError(error);
    }
  }

  @Post('messages/image')
  @Throttle(getThrottleConfig(10))
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Read a reservation from an image' })
  @ApiResponse({ status: 200, description: 'Reply text' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  async handleImage(
    @Body() body: ImageMessageRequest,
  ): Promise<MessageReply> {
    const requestId = randomUUID();
    const startTime = Date.now();

    try {
      const validated = ImageMessageSchema.parse(body);
      const reply = await this.messageHandlerService.handleImage(
        Buffer.from(validated.data, 'base64'),
        validated.mimeType,
      );

      this.logger.log({
        requestId,
        op: 'handle_image',
        durationMs: Date.now() - startTime,
        outcome: reply.kind,
      });

      return reply;
    } catch (error) {
      this.logger.error('Handle image failed', error, {
        requestId,
        durationMs: Date.now() - startTime,
        outcome: 'error',
        op: 'handle_image',
      });
      throw asHttpError(error);
    }
  }

  @Post('reservations')
  @Throttle(getThrottleConfig(10))
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Commit a structured reservation' })
  @ApiResponse({ status: 201, description: 'Reservation committed' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  @ApiResponse({ status: 409, description: 'Slot taken or court busy' })
  @ApiResponse({ status: 422, description: 'Missing or invalid fields' })
  @ApiResponse({ status: 503, description: 'Calendar or ledger unavailable' })
  async createReservation(
    @Body() body: ReservationCandidateRequest,
  ): Promise<ConfirmationResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();

    try {
      const validated = ReservationCandidateSchema.parse(body);
      const result = await this.reservationCommitterService.commit(validated);
      const reply = this.messageHandlerService.replyForCommit(result);

      this.logger.log({
        requestId,
        court: validated.court,
        date: validated.date,
        op: 'create_reservation',
        durationMs: Date.now() - startTime,
        outcome: reply.kind,
      });

      if (!result.ok) {
        throw commitFailureToHttp(result.error, reply.text);
      }
      return toConfirmationResponse(result.value, reply.text);
    } catch (error) {
      this.logger.error('Create reservation failed', error, {
        requestId,
        durationMs: Date.now() - startTime,
        outcome: 'error',
        op: 'create_reservation',
      });
      throw asHttpError(error);
    }
  }

  @Get('reservations/today')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: "List today's reservations" })
  @ApiResponse({ status: 200, description: 'Reservations listed' })
  @ApiResponse({ status: 503, description: 'Ledger unavailable' })
  async listToday() {
    const listed = await this.ledgerQueryService.listToday();
    if (!listed.ok) {
      throw new ServiceUnavailableException({
        error: 'store_unavailable',
        detail: listed.error.message,
      });
    }

    const date = this.ledgerQueryService.today();
    return {
      date,
      reservations: listed.value,
      reply: todayListText(date, listed.value),
    };
  }

  @Get('reservations/summary')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'Monthly reservation summary' })
  @ApiResponse({ status: 200, description: 'Summary computed' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  @ApiResponse({ status: 503, description: 'Ledger unavailable' })
  async monthlySummary(@Query() query: MonthlySummaryQuery) {
    const requestId = randomUUID();

    try {
      const validated = MonthlySummaryQuerySchema.parse(query);
      const summary = await this.ledgerQueryService.monthlySummary(
        validated.year,
        validated.month,
      );
      if (!summary.ok) {
        throw new ServiceUnavailableException({
          error: 'store_unavailable',
          detail: summary.error.message,
        });
      }

      return { ...summary.value, reply: monthlySummaryText(summary.value) };
    } catch (error) {
      this.logger.error('Monthly summary failed', error, {
        requestId,
        outcome: 'error',
        op: 'monthly_summary',
      });
      throw asHttpError(error);
    }
  }

  @Post('reservations/daily-summary')
  @Throttle(getThrottleConfig(5))
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Send today's summary to the operators" })
  @ApiResponse({ status: 200, description: 'Summary sent' })
  @ApiResponse({ status: 503, description: 'Ledger or notification failed' })
  async sendDailySummary() {
    const sent = await this.ledgerQueryService.sendDailySummary();
    if (!sent.ok) {
      throw new ServiceUnavailableException({
        error: 'store_unavailable',
        detail: sent.error.message,
      });
    }
    return sent.value;
  }

  @Post('cancel-requests')
  @Throttle(getThrottleConfig(10))
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Forward a cancellation request to staff' })
  @ApiResponse({ status: 202, description: 'Request forwarded' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  @ApiResponse({ status: 503, description: 'Notification failed' })
  async cancelRequest(@Body() body: CancelRequest) {
    const requestId = randomUUID();

    try {
      const validated = CancelRequestSchema.parse(body);
      const forwarded = await this.messageHandlerService.forwardCancelRequest(
        validated.text,
      );
      if (!forwarded.ok) {
        throw new ServiceUnavailableException({
          error: 'store_unavailable',
          detail: forwarded.error.message,
        });
      }

      this.logger.log({ requestId, op: 'cancel_request', outcome: 'forwarded' });
      return { reply: cancelAcknowledgementText() };
    } catch (error) {
      this.logger.error('Cancel request failed', error, {
        requestId,
        outcome: 'error',
        op: 'cancel_request',
      });
      throw asHttpError(error);
    }
  }

  @Get('help')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'Booking instructions' })
  @ApiResponse({ status: 200, description: 'Help text' })
  getHelp() {
    return { text: helpText(this.policy) };
  }

  @Get('metrics')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'Get metrics' })
  @ApiResponse({ status: 200, description: 'Metrics retrieved' })
  getMetrics() {
    return this.metricsService.getMetrics();
  }
}
