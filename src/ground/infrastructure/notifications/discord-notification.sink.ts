import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NotificationSink } from '../../ports/notification-sink.interface';
import { GROUND_POLICY } from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import { NotificationMessage } from '../../domain/types/notification-message.type';
import { AllConfigType } from '../../../config/config.type';
import { LoggerService } from '../logging/logger.service';
import { buildDiscordPayload } from './discord-embed.builder';

/** Posts operator notifications to a Discord webhook; silent when none is set. */
@Injectable()
export class DiscordNotificationSink implements NotificationSink {
  private readonly webhookUrl: string | undefined;
  private readonly timeoutMs: number;

  constructor(
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    private readonly logger: LoggerService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.webhookUrl = configService.get('ground.discordWebhookUrl', {
      infer: true,
    });
    this.timeoutMs = configService.getOrThrow('ground.externalCallTimeoutMs', {
      infer: true,
    });
  }

  async send(message: NotificationMessage): Promise<void> {
    if (!this.webhookUrl) {
      this.logger.debug('No webhook configured, notification dropped', {
        type: message.type,
      });
      return;
    }

    const response = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildDiscordPayload(message, this.policy)),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(
        `Discord webhook responded ${response.status} ${response.statusText}`,
      );
    }
  }
}
