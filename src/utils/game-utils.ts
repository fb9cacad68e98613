/**
 * Shared interaction utilities
 *
 * Common functionality used across the game and market commands.
 */

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  MessageFlags,
  type Message,
  type RepliableInteraction,
} from 'discord.js';
import { isEconomyError } from '../lib/errors.js';

export interface InteractionLogger {
  error: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
}

const GENERIC_FAILURE = 'An error occurred. Please try again later.';

/**
 * Answer a failed command or button press
 *
 * Economy rejections are shown to the player as-is; anything else is logged and
 * answered with a generic failure. A deferred command has its pending reply
 * edited; anything else gets an ephemeral message.
 */
export async function replyWithError(
  interaction: RepliableInteraction,
  error: unknown,
  logger: InteractionLogger,
  context: string
): Promise<void> {
  let content: string;
  if (isEconomyError(error)) {
    logger.debug(`${context} rejected: ${error.message}`);
    content = `❌ ${error.message}`;
  } else {
    logger.error(`Error in ${context}:`, error);
    content = GENERIC_FAILURE;
  }

  try {
    if (interaction.deferred && !interaction.replied) {
      await interaction.editReply({ content, embeds: [], components: [] });
    } else if (interaction.replied) {
      await interaction.followUp({ content, flags: MessageFlags.Ephemeral });
    } else {
      await interaction.reply({ content, flags: MessageFlags.Ephemeral });
    }
  } catch (replyError) {
    logger.error('Failed to send error message:', replyError);
  }
}

/**
 * Replace a prompt's buttons with a footer note (expired, cancelled, finished)
 */
export async function closePrompt(message: Message, footerText: string, logger: InteractionLogger): Promise<void> {
  try {
    const [first] = message.embeds;
    if (first) {
      const embed = EmbedBuilder.from(first).setFooter({ text: footerText });
      await message.edit({ embeds: [embed], components: [] });
    } else {
      await message.edit({ content: footerText, components: [] });
    }
  } catch (error) {
    logger.error('Error closing prompt:', error);
  }
}

/**
 * Confirm/cancel button row; custom IDs are `<prefix>:confirm` and `<prefix>:cancel`
 */
export function confirmRow(prefix: string, confirmLabel = 'Confirm', cancelLabel = 'Cancel'): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(`${prefix}:confirm`).setLabel(confirmLabel).setStyle(ButtonStyle.Success),
    new ButtonBuilder().setCustomId(`${prefix}:cancel`).setLabel(cancelLabel).setStyle(ButtonStyle.Secondary)
  );
}

/**
 * Milliseconds until a session deadline (never negative)
 */
export function msUntil(deadline: Date): number {
  return Math.max(0, deadline.getTime() - Date.now());
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
