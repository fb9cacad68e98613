import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { ComponentType, EmbedBuilder, MessageFlags, type ButtonInteraction, type Message } from 'discord.js';
import { Config } from '../config.js';
import { formatCredits } from '../lib/utils.js';
import { closePrompt, confirmRow, msUntil, replyWithError } from '../utils/game-utils.js';

/**
 * Sell command - sell items back for half their current price
 * The quote is shown first and must be confirmed before anything moves
 */
@ApplyOptions<Command.Options>({
  name: 'sell',
  description: 'Sell collectible items for credits',
  preconditions: ['CasinoChannelOnly'],
})
export class SellCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addStringOption((option) => option.setName('item').setDescription('Item ID or name').setRequired(true))
          .addIntegerOption((option) => option.setName('quantity').setDescription('How many copies').setMinValue(1)),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    const userId = interaction.user.id;

    try {
      await interaction.deferReply();

      const query = interaction.options.getString('item', true);
      const quantity = interaction.options.getInteger('quantity') ?? 1;

      let prompt: Message | null = null;
      const { session, item } = await this.container.marketService.requestSale(userId, query, quantity, async () => {
        if (prompt) {
          await closePrompt(prompt, '⏰ Offer expired. Nothing was sold.', this.container.logger);
        }
      });

      const embed = new EmbedBuilder()
        .setColor(0xe67e22)
        .setTitle('💱 Sell items')
        .setDescription(
          `Sell **${quantity}× ${item.name}** for **${formatCredits(session.data.payout)}**?\n` +
            'The price is locked until this offer expires.'
        )
        .setFooter({ text: 'Offer valid until' })
        .setTimestamp(session.expiresAt);

      const response = await interaction.editReply({
        embeds: [embed],
        components: [confirmRow('sell', 'Sell', 'Keep')],
      });
      prompt = response;

      const collector = response.createMessageComponentCollector({
        componentType: ComponentType.Button,
        time: msUntil(session.expiresAt),
      });

      collector.on('collect', async (buttonInteraction: ButtonInteraction) => {
        // Ensure the button was clicked by the seller
        if (buttonInteraction.user.id !== userId) {
          await buttonInteraction.reply({
            content: "This isn't your sale.",
            flags: MessageFlags.Ephemeral,
          });
          return;
        }

        try {
          if (buttonInteraction.customId === 'sell:cancel') {
            await this.container.marketService.cancelSale(session.sessionId, buttonInteraction.user.id);
            await buttonInteraction.update({ content: 'Sale cancelled.', embeds: [], components: [] });
            collector.stop('cancelled');
            return;
          }

          const result = await this.container.marketService.confirmSale(session.sessionId, buttonInteraction.user.id);
          const done = new EmbedBuilder()
            .setColor(0x2ecc71)
            .setTitle('💱 Sold')
            .setDescription(
              `You sold **${result.quantity}× ${result.item.name}** for **${formatCredits(result.payout)}**.`
            )
            .setFooter({ text: `Balance: ${result.balance.toLocaleString('en-US')}` });
          await buttonInteraction.update({ embeds: [done], components: [] });
          collector.stop('completed');
        } catch (error) {
          await replyWithError(buttonInteraction, error, this.container.logger, 'sell button');
        }
      });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'sell command');
    }
  }
}
