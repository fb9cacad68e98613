import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder } from 'discord.js';
import { Config } from '../config.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * Inventory command - Shows a user's items and unopened cases
 */
@ApplyOptions<Command.Options>({
  name: 'inventory',
  description: 'View your collectible items and cases',
})
export class InventoryCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addUserOption((option) => option.setName('user').setDescription('Whose inventory to view')),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      await interaction.deferReply();

      const target = interaction.options.getUser('user') ?? interaction.user;
      const { catalogService, inventoryService, priceService } = this.container;
      const inventory = await inventoryService.get(target.id);

      // Items grouped in rarity-table order, rarest last
      const itemLines: string[] = [];
      for (const tier of catalogService.rarities) {
        for (const [itemId, count] of Object.entries(inventory.items)) {
          const item = catalogService.getItem(itemId);
          if (item?.rarity === tier.tag) {
            itemLines.push(`${tier.emoji} **${item.name}** ×${count} · ~${priceService.priceOf(item)} each`);
          }
        }
      }

      const caseLines = Object.entries(inventory.cases).map(([caseId, count]) => {
        const name = catalogService.getCase(caseId)?.name ?? caseId;
        return `📦 **${name}** ×${count}`;
      });

      const embed = new EmbedBuilder()
        .setColor(0x9b59b6)
        .setTitle(`🎒 ${target.username}'s inventory`)
        .addFields(
          { name: 'Cases', value: caseLines.length > 0 ? caseLines.join('\n') : 'No cases' },
          { name: 'Items', value: itemLines.length > 0 ? itemLines.join('\n').slice(0, 1024) : 'No items yet' }
        )
        .setTimestamp();

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'inventory command');
    }
  }
}
