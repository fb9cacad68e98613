import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ComponentType,
  EmbedBuilder,
  type ButtonInteraction,
  type Message,
} from 'discord.js';
import { Config } from '../config.js';
import { formatCredits } from '../lib/utils.js';
import { closePrompt, msUntil, replyWithError } from '../utils/game-utils.js';

/**
 * Duel command - challenge the channel to a coin flip for credits
 * The bet is held until someone accepts or the challenge expires
 */
@ApplyOptions<Command.Options>({
  name: 'duel',
  description: 'Challenge anyone to a coin-flip duel for credits',
  preconditions: ['CasinoChannelOnly'],
})
export class DuelCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addIntegerOption((option) =>
            option.setName('bet').setDescription('Credits each player puts in').setRequired(true).setMinValue(1)
          ),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    const challengerId = interaction.user.id;
    const bet = interaction.options.getInteger('bet', true);

    try {
      // Defer reply immediately to prevent timeout (Discord requires response within 3s)
      await interaction.deferReply();

      let prompt: Message | null = null;
      const duel = await this.container.duelService.challenge(challengerId, bet, async () => {
        if (prompt) {
          const footer = `⏰ Nobody accepted. ${formatCredits(bet)} returned to the challenger.`;
          await closePrompt(prompt, footer, this.container.logger);
        }
      });

      const embed = new EmbedBuilder()
        .setColor(0xf1c40f)
        .setTitle('⚔️ Duel!')
        .setDescription(
          `<@${challengerId}> puts **${formatCredits(bet)}** on the line.\n` +
            `Match the bet to fight: the winner takes **${formatCredits(bet * 2)}**.`
        )
        .setFooter({ text: 'Open until' })
        .setTimestamp(duel.expiresAt);

      const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
        new ButtonBuilder().setCustomId('duel:accept').setLabel('Accept duel').setEmoji('⚔️').setStyle(ButtonStyle.Danger)
      );

      const response = await interaction.editReply({ embeds: [embed], components: [row] });
      prompt = response;

      const collector = response.createMessageComponentCollector({
        componentType: ComponentType.Button,
        time: msUntil(duel.expiresAt),
      });

      collector.on('collect', async (buttonInteraction: ButtonInteraction) => {
        try {
          const result = await this.container.duelService.accept(duel.sessionId, buttonInteraction.user.id);

          const resultEmbed = new EmbedBuilder()
            .setColor(0x2ecc71)
            .setTitle('⚔️ Duel settled')
            .setDescription(
              `🪙 The coin has spoken!\n\n` +
                `🏆 <@${result.winnerId}> wins **${formatCredits(result.payout)}**\n` +
                `💀 <@${result.loserId}> loses **${formatCredits(result.bet)}**`
            )
            .setFooter({ text: `Winner's balance: ${result.winnerBalance.toLocaleString('en-US')}` })
            .setTimestamp();

          await buttonInteraction.update({ embeds: [resultEmbed], components: [] });
          collector.stop('completed');
        } catch (error) {
          await replyWithError(buttonInteraction, error, this.container.logger, 'duel accept');
        }
      });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'duel command');
    }
  }
}
