import { container } from '@sapphire/framework';
import { EmbedBuilder, type Message } from 'discord.js';
import type { AuditEntry, AuditSink, OperatorNotifier } from './types.js';
import { auditLogger } from './logger.js';
import { formatCredits } from './utils.js';

/**
 * Ledger audit trail and operator notices
 *
 * Entries always go to the audit log file. When a credit log channel is
 * configured they are also posted there.
 */
export class CreditLog implements AuditSink, OperatorNotifier {
  constructor(private readonly channelId?: string) {}

  record(entry: AuditEntry): void {
    auditLogger.info('ledger_adjustment', { ...entry, at: entry.at.toISOString() });

    const sign = entry.delta > 0 ? '+' : '';
    const embed = new EmbedBuilder()
      .setColor(entry.delta > 0 ? 0x2ecc71 : 0xe74c3c)
      .setDescription(
        `<@${entry.userId}> ${sign}${entry.delta} (${entry.reason})\n` +
          `${formatCredits(entry.oldBalance)} → ${formatCredits(entry.newBalance)}`
      )
      .setTimestamp(entry.at);
    this.post({ embeds: [embed] });
  }

  notify(message: string): void {
    container.logger.error(`[operator] ${message}`);
    auditLogger.error('operator_notice', { message });
    this.post({ content: message });
  }

  private post(payload: { content?: string; embeds?: EmbedBuilder[] }): void {
    if (!this.channelId || !container.client?.isReady()) {
      return;
    }
    const channelId = this.channelId;
    container.client.channels
      .fetch(channelId)
      .then((channel): Promise<Message> | undefined => {
        if (channel?.isSendable()) {
          return channel.send(payload);
        }
        container.logger.warn(`Credit log channel ${channelId} is not a text channel`);
        return undefined;
      })
      .catch((error: unknown) => {
        container.logger.warn('Failed to post to credit log channel:', error);
      });
  }
}
