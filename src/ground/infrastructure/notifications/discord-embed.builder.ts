import { GroundPolicy } from '../../domain/policy/ground-policy';
import { DAY_TYPE_LABELS } from '../../domain/ledger/ledger-row.codec';
import { NotificationMessage } from '../../domain/types/notification-message.type';
import { courtLabel, formatYen } from '../../application/messages/reply-text';

export const EMBED_COLORS = {
  created: 0x2ecc71,
  conflict: 0xf39c12,
  cancel: 0xe74c3c,
  summary: 0x3498db,
} as const;

interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title: string;
  color: number;
  description?: string;
  fields?: EmbedField[];
  timestamp?: string;
}

export interface DiscordWebhookPayload {
  embeds: DiscordEmbed[];
}

// Discord rejects empty field values
const orDash = (value: string): string => value || '-';

export function buildDiscordPayload(
  message: NotificationMessage,
  policy: GroundPolicy,
): DiscordWebhookPayload {
  switch (message.type) {
    case 'reservation_created': {
      const { request, fee } = message;
      return {
        embeds: [
          {
            title: 'New reservation',
            color: EMBED_COLORS.created,
            fields: [
              { name: 'Reservation ID', value: message.reservationId },
              {
                name: 'Date',
                value: `${request.date} ${request.startTime}-${request.endTime}`,
                inline: true,
              },
              {
                name: 'Court',
                value: courtLabel(policy, request.court),
                inline: true,
              },
              { name: 'Name', value: request.name, inline: true },
              { name: 'Phone', value: orDash(request.phone), inline: true },
              {
                name: 'Fee',
                value: `${formatYen(fee.total)} (${fee.categoryLabel}, ${DAY_TYPE_LABELS[fee.dayType]}, ${fee.hours}h)`,
              },
              { name: 'Ledger row', value: String(message.ledgerRowIndex), inline: true },
              { name: 'Notes', value: orDash(request.notes) },
            ],
            timestamp: message.sentAt.toISOString(),
          },
        ],
      };
    }

    case 'conflict': {
      const { request } = message;
      return {
        embeds: [
          {
            title: 'Reservation turned away: slot taken',
            color: EMBED_COLORS.conflict,
            description: `${request.date} ${request.startTime}-${request.endTime} ${courtLabel(policy, request.court)}`,
            fields: [
              { name: 'Name', value: request.name, inline: true },
              { name: 'Phone', value: orDash(request.phone), inline: true },
            ],
          },
        ],
      };
    }

    case 'cancel_request':
      return {
        embeds: [
          {
            title: 'Cancellation request',
            color: EMBED_COLORS.cancel,
            description: message.text,
            timestamp: message.sentAt.toISOString(),
          },
        ],
      };

    case 'daily_summary':
      return {
        embeds: [
          {
            title: `Reservations for ${message.date}`,
            color: EMBED_COLORS.summary,
            description:
              message.records.length === 0
                ? 'No reservations today.'
                : message.records
                    .map(
                      (r) =>
                        `${r.startTime}-${r.endTime} ${r.name} [${r.court}]`,
                    )
                    .join('\n'),
            fields: [
              {
                name: 'Reservations',
                value: String(message.records.length),
                inline: true,
              },
              {
                name: 'Total fees',
                value: formatYen(message.totalFee),
                inline: true,
              },
            ],
          },
        ],
      };
  }
}
