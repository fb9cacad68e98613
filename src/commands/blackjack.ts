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
import { SESSION_TTL_MINUTES, SessionKind } from '../constants.js';
import { formatCard, formatCards, handValue } from '../lib/cards.js';
import { formatCredits } from '../lib/utils.js';
import type { BlackjackOutcome, BlackjackResult, BlackjackSession } from '../services/BlackjackService.js';
import { closePrompt, replyWithError } from '../utils/game-utils.js';

const BTN_ID_DEAL = 'blackjack:deal';
const BTN_ID_HIT = 'blackjack:hit';
const BTN_ID_STAND = 'blackjack:stand';
const BTN_ID_REPLAY = 'blackjack:replay';

const OUTCOME_TEXT: Record<BlackjackOutcome, string> = {
  win: '✅ You beat the dealer!',
  dealer_bust: '✅ The dealer busted!',
  push: '🤝 Push. Your bet is returned.',
  loss: '❌ The dealer wins.',
  bust: '💥 Bust!',
};

function dealRow(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(BTN_ID_DEAL).setLabel('Deal').setEmoji('🃏').setStyle(ButtonStyle.Success)
  );
}

function playRow(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(BTN_ID_HIT).setLabel('➕ Hit').setStyle(ButtonStyle.Primary),
    new ButtonBuilder().setCustomId(BTN_ID_STAND).setLabel('✋ Stand').setStyle(ButtonStyle.Secondary)
  );
}

function replayRow(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(BTN_ID_REPLAY).setLabel('Play again').setEmoji('🔁').setStyle(ButtonStyle.Primary)
  );
}

/**
 * Blackjack command - play a hand against the dealer, hit or stand
 */
@ApplyOptions<Command.Options>({
  name: 'blackjack',
  description: 'Play Blackjack against the dealer',
  preconditions: ['CasinoChannelOnly'],
})
export class BlackjackCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addIntegerOption((option) =>
            option.setName('bet').setDescription('Credits to bet each hand').setRequired(true).setMinValue(1)
          ),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    const playerId = interaction.user.id;
    const bet = interaction.options.getInteger('bet', true);

    try {
      // Defer reply immediately to prevent timeout (Discord requires response within 3s)
      await interaction.deferReply();

      let prompt: Message | null = null;
      const onExpire = async () => {
        if (prompt) {
          await closePrompt(prompt, '⏰ Table closed. Any bet in play was returned.', this.container.logger);
        }
      };

      const { blackjackService } = this.container;
      let { session, balance } = await blackjackService.start(playerId, onExpire);

      const response = await interaction.editReply({
        embeds: [this.betEmbed(playerId, bet, balance)],
        components: [dealRow()],
      });
      prompt = response;

      // Idle timeout matches the table lifetime; each replay opens a fresh table
      const collector = response.createMessageComponentCollector({
        componentType: ComponentType.Button,
        idle: SESSION_TTL_MINUTES[SessionKind.BLACKJACK] * 60 * 1000,
      });

      collector.on('collect', async (buttonInteraction: ButtonInteraction) => {
        // Ensure the button was clicked by the player
        if (buttonInteraction.user.id !== playerId) {
          await buttonInteraction.reply({
            content: "This isn't your blackjack game.",
            flags: MessageFlags.Ephemeral,
          });
          return;
        }

        try {
          switch (buttonInteraction.customId) {
            case BTN_ID_REPLAY: {
              ({ session, balance } = await blackjackService.replay(playerId, buttonInteraction.user.id, onExpire));
              await buttonInteraction.update({
                embeds: [this.betEmbed(playerId, bet, balance)],
                components: [dealRow()],
              });
              break;
            }
            case BTN_ID_DEAL: {
              const dealt = await blackjackService.placeBet(session.sessionId, playerId, bet);
              await buttonInteraction.update({ embeds: [this.handEmbed(dealt)], components: [playRow()] });
              break;
            }
            case BTN_ID_HIT: {
              const { session: hand, card, result } = await blackjackService.hit(session.sessionId, playerId);
              if (result) {
                await buttonInteraction.update({ embeds: [this.resultEmbed(playerId, result)], components: [replayRow()] });
              } else {
                await buttonInteraction.update({
                  embeds: [this.handEmbed(hand, `You drew ${formatCard(card)}`)],
                  components: [playRow()],
                });
              }
              break;
            }
            case BTN_ID_STAND: {
              const result = await blackjackService.stand(session.sessionId, playerId);
              await buttonInteraction.update({ embeds: [this.resultEmbed(playerId, result)], components: [replayRow()] });
              break;
            }
          }
        } catch (error) {
          await replyWithError(buttonInteraction, error, this.container.logger, 'blackjack button');
        }
      });

      collector.on('end', async (_collected, reason) => {
        if (reason === 'idle' && !this.container.gameStateService.get(session.sessionId, SessionKind.BLACKJACK)) {
          // Hand already settled: just retire the replay button
          await closePrompt(response, 'Thanks for playing!', this.container.logger);
        }
      });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'blackjack command');
    }
  }

  private betEmbed(playerId: string, bet: number, balance: number): EmbedBuilder {
    return new EmbedBuilder()
      .setColor(0xdaa520)
      .setTitle('🃏 Blackjack')
      .setDescription(`<@${playerId}>, the table is ready. Deal a hand for **${formatCredits(bet)}**?`)
      .setFooter({ text: `Balance: ${balance.toLocaleString('en-US')} · Dealer stands on 17` });
  }

  private handEmbed(session: BlackjackSession, note?: string): EmbedBuilder {
    const { playerCards, dealerCards, bet } = session.data;
    const [upcard] = dealerCards;
    const lines = [
      `**Dealer:** ${upcard ? formatCard(upcard) : ''}  ❓`,
      `**Hand:** ${formatCards(playerCards)} (${handValue(playerCards)})`,
    ];
    if (note) {
      lines.push('', note);
    }
    return new EmbedBuilder()
      .setColor(0xdaa520)
      .setTitle('🃏 Blackjack')
      .setDescription(lines.join('\n'))
      .addFields({ name: 'Bet', value: formatCredits(bet), inline: true });
  }

  private resultEmbed(playerId: string, result: BlackjackResult): EmbedBuilder {
    const won = result.outcome === 'win' || result.outcome === 'dealer_bust';
    const color = won ? 0x00ff00 : result.outcome === 'push' ? 0xd3d3d3 : 0xff0000;
    return new EmbedBuilder()
      .setColor(color)
      .setTitle('🃏 Blackjack')
      .setDescription(
        `**Player:** <@${playerId}>\n\n` +
          `**Dealer:** ${formatCards(result.dealerCards)} (${result.dealerTotal})\n` +
          `**Hand:** ${formatCards(result.playerCards)} (${result.playerTotal})\n\n` +
          OUTCOME_TEXT[result.outcome]
      )
      .addFields(
        { name: 'Bet', value: formatCredits(result.bet), inline: true },
        { name: 'Final Payout', value: formatCredits(result.payout), inline: true },
        { name: 'Balance', value: formatCredits(result.balance), inline: true }
      )
      .setTimestamp();
  }
}
