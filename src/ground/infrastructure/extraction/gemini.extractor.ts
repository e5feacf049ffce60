import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  GenerativeModel,
  GoogleGenerativeAI,
  Schema,
  SchemaType,
} from '@google/generative-ai';
import { formatInTimeZone } from 'date-fns-tz';
import { Extractor } from '../../ports/extractor.interface';
import { CLOCK, GROUND_POLICY } from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import { ExtractionError } from '../../domain/errors/reservation.errors';
import { Clock } from '../../domain/types/clock.type';
import {
  ExtractionInput,
  ExtractionOutcome,
} from '../../domain/types/extraction.type';
import { Result, err } from '../../domain/types/result.type';
import { AllConfigType } from '../../../config/config.type';
import { LoggerService } from '../logging/logger.service';
import { parseExtractionResponse } from './extraction-response.parser';

const nullableString = (description: string): Schema => ({
  type: SchemaType.STRING,
  description,
  nullable: true,
});

const RESPONSE_SCHEMA: Schema = {
  type: SchemaType.OBJECT,
  properties: {
    isReservation: {
      type: SchemaType.BOOLEAN,
      description: 'Whether the message asks to book the ground.',
    },
    confidence: {
      type: SchemaType.NUMBER,
      description: 'Confidence in the extraction, 0 to 1.',
    },
    date: nullableString('Date of use in YYYY-MM-DD. Resolve relative dates against today.'),
    startTime: nullableString('Start time in HH:MM, 24-hour clock.'),
    endTime: nullableString('End time in HH:MM, 24-hour clock.'),
    hours: {
      type: SchemaType.NUMBER,
      description: 'Requested duration in hours.',
      nullable: true,
    },
    court: nullableString('Court id from the list of courts.'),
    category: nullableString('Pricing category id from the list of categories.'),
    isWeekend: {
      type: SchemaType.BOOLEAN,
      description: 'True when the date falls on a weekend.',
      nullable: true,
    },
    isHoliday: {
      type: SchemaType.BOOLEAN,
      description: 'True when the date is a public holiday.',
      nullable: true,
    },
    name: nullableString('Name of the person booking.'),
    phone: nullableString('Phone number.'),
    email: nullableString('Email address.'),
    teamName: nullableString('Team or club name.'),
    partySize: {
      type: SchemaType.INTEGER,
      description: 'Number of people.',
      nullable: true,
    },
    notes: nullableString('Anything else worth passing on to staff.'),
  },
  required: ['isReservation', 'confidence'],
};

/** Reads reservation fields out of chat text or a photographed form. */
@Injectable()
export class GeminiExtractor implements Extractor {
  private readonly model: GenerativeModel | null;

  constructor(
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly logger: LoggerService,
    configService: ConfigService<AllConfigType>,
  ) {
    const gemini = configService.getOrThrow('ground.gemini', { infer: true });
    if (!gemini.apiKey) {
      this.logger.warn('GEMINI_API_KEY is not set; messages cannot be read');
      this.model = null;
      return;
    }

    this.model = new GoogleGenerativeAI(gemini.apiKey).getGenerativeModel(
      {
        model: gemini.model,
        generationConfig: {
          responseMimeType: 'application/json',
          responseSchema: RESPONSE_SCHEMA,
        },
      },
      {
        timeout: configService.getOrThrow('ground.externalCallTimeoutMs', {
          infer: true,
        }),
      },
    );
  }

  async extract(
    input: ExtractionInput,
  ): Promise<Result<ExtractionOutcome, ExtractionError>> {
    if (!this.model) {
      return err(new ExtractionError('Extractor is not configured'));
    }

    const prompt = this.buildPrompt(input.kind);
    try {
      const result =
        input.kind === 'text'
          ? await this.model.generateContent(
              `${prompt}\n\nMessage:\n"""\n${input.text}\n"""`,
            )
          : await this.model.generateContent([
              prompt,
              {
                inlineData: {
                  data: input.data.toString('base64'),
                  mimeType: input.mimeType,
                },
              },
            ]);

      return parseExtractionResponse(result.response.text());
    } catch (error) {
      this.logger.error('Extraction request failed', error, {
        input: input.kind,
      });
      return err(new ExtractionError('Extraction request failed', error));
    }
  }

  private buildPrompt(kind: ExtractionInput['kind']): string {
    const now = this.clock.now();
    const today = formatInTimeZone(now, this.policy.timezone, 'yyyy-MM-dd (EEEE)');
    const courts = this.policy.courts
      .map((c) => `${c.id} (${c.label})`)
      .join(', ');
    const categories = Object.entries(this.policy.pricing.categories)
      .map(([id, rates]) => `${id} (${rates.label})`)
      .join(', ');

    return [
      `You take ground reservations for ${this.policy.groundName}.`,
      `Today is ${today} in ${this.policy.timezone}.`,
      `Courts: ${courts}.`,
      `Pricing categories: ${categories}.`,
      kind === 'image'
        ? 'The image is a reservation form or a screenshot of a booking request.'
        : 'The message below is a chat message sent to the reservation desk.',
      'Extract the reservation fields. Use null for anything not stated; never guess a name or phone number.',
      'If the message is not asking to book the ground, set isReservation to false.',
    ].join('\n');
  }
}
