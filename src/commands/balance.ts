import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder } from 'discord.js';
import { Config } from '../config.js';
import { formatCredits } from '../lib/utils.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * Balance command - Shows a user's current social credits
 */
@ApplyOptions<Command.Options>({
  name: 'balance',
  description: 'Check your social credit balance',
})
export class BalanceCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addUserOption((option) => option.setName('user').setDescription('Whose balance to check')),
      // Register to specific guild if GUILD_ID is set (dev mode), otherwise register globally
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      // Defer reply immediately to prevent timeout (Discord requires response within 3s)
      await interaction.deferReply();

      const target = interaction.options.getUser('user') ?? interaction.user;

      const [balance, rank] = await Promise.all([
        this.container.walletService.getBalance(target.id),
        this.container.leaderboardService.getRank(target.id),
      ]);

      const embed = new EmbedBuilder()
        .setColor(0x00ff00)
        .setTitle(target.id === interaction.user.id ? '💳 Your Credits' : `💳 ${target.username}'s Credits`)
        .setDescription(`**Balance:** ${formatCredits(balance)}`)
        .setFooter({ text: rank ? `Rank #${rank}` : 'Unranked' })
        .setTimestamp();

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'balance command');
    }
  }
}
