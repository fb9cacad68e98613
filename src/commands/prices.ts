import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder } from 'discord.js';
import { Config } from '../config.js';
import { PRICE_CONFIG } from '../constants.js';
import { formatCredits } from '../lib/utils.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * Prices command - current item price per rarity
 */
@ApplyOptions<Command.Options>({
  name: 'prices',
  description: 'View current collectible prices by rarity',
})
export class PricesCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) => builder.setName(this.name).setDescription(this.description),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      await interaction.deferReply();

      const { priceService } = this.container;
      const change = priceService.getChange();
      const reference = priceService.latestReference();
      const trend = change > 0.05 ? '📈' : change < -0.05 ? '📉' : '➡️';

      const lines = priceService.tierPrices().map(({ tier, price }) => {
        const delta = ((price - tier.basePrice) / tier.basePrice) * 100;
        const sign = delta > 0 ? '+' : '';
        return `${tier.emoji} **${tier.tag}**: ${formatCredits(price)} (base ${tier.basePrice}, ${sign}${delta.toFixed(1)}%)`;
      });

      const embed = new EmbedBuilder()
        .setColor(0x00bfff)
        .setTitle('📊 Collectible prices')
        .setDescription(
          (reference === null
            ? '💰 Reference price unavailable: base prices apply.'
            : `💰 Reference: $${reference.toFixed(2)} ${trend} ${(change * 100).toFixed(1)}% vs ${PRICE_CONFIG.HISTORY_WINDOW_HOURS}h average`) +
            `\n\n${lines.join('\n')}`
        )
        .setFooter({
          text: `Prices update every ${PRICE_CONFIG.RECOMPUTE_INTERVAL_MINUTES} minutes · items sell for half`,
        });

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'prices command');
    }
  }
}
