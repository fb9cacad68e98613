import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ComponentType,
  EmbedBuilder,
  MessageFlags,
  type ButtonInteraction,
  type Message,
} from 'discord.js';
import { Config } from '../config.js';
import { REDBLACK_CONFIG, SESSION_TTL_MINUTES, SessionKind } from '../constants.js';
import type { RedBlackSide } from '../lib/types.js';
import type { RedBlackResult, RedBlackSession } from '../services/RedBlackService.js';
import { formatCredits } from '../lib/utils.js';
import { closePrompt, replyWithError, sleep } from '../utils/game-utils.js';

const SIDE_EMOJI: Record<RedBlackSide, string> = { red: '🔴', black: '⚫' };

function betRow(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId('redblack:red').setLabel('Red').setEmoji('🔴').setStyle(ButtonStyle.Danger),
    new ButtonBuilder().setCustomId('redblack:black').setLabel('Black').setEmoji('⚫').setStyle(ButtonStyle.Secondary)
  );
}

function replayRow(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId('redblack:replay').setLabel('Play again').setEmoji('🔁').setStyle(ButtonStyle.Primary)
  );
}

/**
 * Red/black command - bet on the color of a single draw, double or nothing
 */
@ApplyOptions<Command.Options>({
  name: 'redblack',
  description: 'Bet on red or black: double or nothing',
  preconditions: ['CasinoChannelOnly'],
})
export class RedBlackCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addIntegerOption((option) =>
            option.setName('bet').setDescription('Credits to bet each round').setRequired(true).setMinValue(1)
          ),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    const playerId = interaction.user.id;
    const amount = interaction.options.getInteger('bet', true);

    try {
      // Defer reply immediately to prevent timeout (Discord requires response within 3s)
      await interaction.deferReply();

      let prompt: Message | null = null;
      const onExpire = async () => {
        if (prompt) {
          await closePrompt(prompt, '⏰ Round expired. Any placed bet was returned.', this.container.logger);
        }
      };

      let { session, balance } = await this.container.redBlackService.start(playerId, onExpire);

      const response = await interaction.editReply({
        embeds: [this.betEmbed(playerId, amount, balance)],
        components: [betRow()],
      });
      prompt = response;

      // Idle timeout matches the round lifetime; each replay starts a fresh round
      const collector = response.createMessageComponentCollector({
        componentType: ComponentType.Button,
        idle: SESSION_TTL_MINUTES[SessionKind.REDBLACK] * 60 * 1000,
      });

      collector.on('collect', async (buttonInteraction: ButtonInteraction) => {
        // Ensure the button was clicked by the player
        if (buttonInteraction.user.id !== playerId) {
          await buttonInteraction.reply({
            content: "This isn't your round. Start your own with **/redblack**.",
            flags: MessageFlags.Ephemeral,
          });
          return;
        }

        try {
          if (buttonInteraction.customId === 'redblack:replay') {
            ({ session, balance } = await this.container.redBlackService.replay(
              playerId,
              buttonInteraction.user.id,
              onExpire
            ));
            await buttonInteraction.update({
              embeds: [this.betEmbed(playerId, amount, balance)],
              components: [betRow()],
            });
            return;
          }

          const side = buttonInteraction.customId === 'redblack:red' ? 'red' : 'black';
          const placed = await this.container.redBlackService.placeBet(session.sessionId, playerId, side, amount);
          await this.animate(buttonInteraction, placed);

          const result = await this.container.redBlackService.settle(placed.sessionId);
          await buttonInteraction.editReply({
            embeds: [this.resultEmbed(playerId, result)],
            components: [replayRow()],
          });
        } catch (error) {
          await replyWithError(buttonInteraction, error, this.container.logger, 'redblack button');
        }
      });

      collector.on('end', async (_collected, reason) => {
        if (reason === 'idle' && !this.container.gameStateService.get(session.sessionId, SessionKind.REDBLACK)) {
          // Round already settled: just retire the replay button
          await closePrompt(response, 'Thanks for playing!', this.container.logger);
        }
      });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'redblack command');
    }
  }

  /**
   * Reveal animation: runs outside every lock, purely cosmetic
   */
  private async animate(buttonInteraction: ButtonInteraction, session: RedBlackSession): Promise<void> {
    const frames = this.container.redBlackService.revealFrames();
    const side = session.data.side ?? 'red';

    await buttonInteraction.update({
      embeds: [this.frameEmbed(session, side, frames[0] ?? side)],
      components: [],
    });
    for (const frame of frames.slice(1)) {
      await sleep(REDBLACK_CONFIG.REVEAL_FRAME_DELAY_MS);
      await buttonInteraction.editReply({ embeds: [this.frameEmbed(session, side, frame)] });
    }
    await sleep(REDBLACK_CONFIG.REVEAL_FRAME_DELAY_MS);
  }

  private betEmbed(playerId: string, amount: number, balance: number): EmbedBuilder {
    return new EmbedBuilder()
      .setColor(0x2c3e50)
      .setTitle('🔴⚫ Red or Black')
      .setDescription(`<@${playerId}>, pick a color for **${formatCredits(amount)}**.\nA match pays double.`)
      .setFooter({ text: `Balance: ${balance.toLocaleString('en-US')}` });
  }

  private frameEmbed(session: RedBlackSession, side: RedBlackSide, frame: RedBlackSide): EmbedBuilder {
    return new EmbedBuilder()
      .setColor(frame === 'red' ? 0xe74c3c : 0x23272a)
      .setTitle('🔴⚫ Red or Black')
      .setDescription(
        `<@${session.ownerId}> bet **${formatCredits(session.data.amount)}** on ${SIDE_EMOJI[side]} ${side}\n\n` +
          `# ${SIDE_EMOJI[frame]}`
      );
  }

  private resultEmbed(playerId: string, result: RedBlackResult): EmbedBuilder {
    const headline = result.won
      ? `🎉 You won **${formatCredits(result.payout)}**!`
      : `😢 You lost **${formatCredits(result.amount)}**.`;
    return new EmbedBuilder()
      .setColor(result.won ? 0x2ecc71 : 0xe74c3c)
      .setTitle('🔴⚫ Red or Black')
      .setDescription(
        `<@${playerId}> bet on ${SIDE_EMOJI[result.side]} ${result.side}\n` +
          `It landed on ${SIDE_EMOJI[result.outcome]} **${result.outcome}**\n\n${headline}`
      )
      .setFooter({ text: `Balance: ${result.balance.toLocaleString('en-US')}` })
      .setTimestamp();
  }
}
