import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { ComponentType, EmbedBuilder, MessageFlags, type ButtonInteraction, type Message } from 'discord.js';
import { Config } from '../config.js';
import { formatCredits } from '../lib/utils.js';
import { closePrompt, confirmRow, msUntil, replyWithError } from '../utils/game-utils.js';

/**
 * Trade command - offer items to another user for credits
 * Only the named buyer can accept; either side can decline
 */
@ApplyOptions<Command.Options>({
  name: 'trade',
  description: 'Offer collectible items to another user for credits',
  preconditions: ['CasinoChannelOnly'],
})
export class TradeCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addUserOption((option) => option.setName('user').setDescription('Who you are selling to').setRequired(true))
          .addStringOption((option) => option.setName('item').setDescription('Item ID or name').setRequired(true))
          .addIntegerOption((option) =>
            option.setName('price').setDescription('Total credits asked').setRequired(true).setMinValue(1)
          )
          .addIntegerOption((option) => option.setName('quantity').setDescription('How many copies').setMinValue(1)),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    const sellerId = interaction.user.id;

    try {
      const buyer = interaction.options.getUser('user', true);
      const query = interaction.options.getString('item', true);
      const price = interaction.options.getInteger('price', true);
      const quantity = interaction.options.getInteger('quantity') ?? 1;

      if (buyer.bot) {
        await interaction.reply({ content: '❌ Bots do not trade.', flags: MessageFlags.Ephemeral });
        return;
      }

      await interaction.deferReply();

      let prompt: Message | null = null;
      const { session, item } = await this.container.marketService.offerTrade(
        sellerId,
        buyer.id,
        query,
        quantity,
        price,
        async () => {
          if (prompt) {
            await closePrompt(prompt, '⏰ Offer expired.', this.container.logger);
          }
        }
      );

      const embed = new EmbedBuilder()
        .setColor(0x1abc9c)
        .setTitle('🤝 Trade offer')
        .setDescription(
          `<@${sellerId}> offers **${quantity}× ${item.name}** to <@${buyer.id}> for **${formatCredits(price)}**.`
        )
        .setFooter({ text: 'Offer valid until' })
        .setTimestamp(session.expiresAt);

      const response = await interaction.editReply({
        content: `<@${buyer.id}>`,
        embeds: [embed],
        components: [confirmRow('trade', 'Accept', 'Decline')],
      });
      prompt = response;

      const collector = response.createMessageComponentCollector({
        componentType: ComponentType.Button,
        time: msUntil(session.expiresAt),
      });

      collector.on('collect', async (buttonInteraction: ButtonInteraction) => {
        const actorId = buttonInteraction.user.id;
        try {
          if (buttonInteraction.customId === 'trade:cancel') {
            await this.container.marketService.declineTrade(session.sessionId, actorId);
            await buttonInteraction.update({
              content: `Trade declined by <@${actorId}>.`,
              embeds: [],
              components: [],
            });
            collector.stop('declined');
            return;
          }

          const result = await this.container.marketService.acceptTrade(session.sessionId, actorId);
          const done = new EmbedBuilder()
            .setColor(0x2ecc71)
            .setTitle('🤝 Trade complete')
            .setDescription(
              `<@${result.buyerId}> bought **${result.quantity}× ${result.item.name}** ` +
                `from <@${result.sellerId}> for **${formatCredits(result.price)}**.`
            )
            .setTimestamp();
          await buttonInteraction.update({ content: '', embeds: [done], components: [] });
          collector.stop('completed');
        } catch (error) {
          await replyWithError(buttonInteraction, error, this.container.logger, 'trade button');
        }
      });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'trade command');
    }
  }
}
