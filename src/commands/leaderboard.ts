import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder } from 'discord.js';
import { Config } from '../config.js';
import { LEADERBOARD_CONFIG } from '../constants.js';
import { formatCredits } from '../lib/utils.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * Leaderboard command - Shows the users with the most social credits
 */
@ApplyOptions<Command.Options>({
  name: 'leaderboard',
  description: 'View the users with the most social credits',
})
export class LeaderboardCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addIntegerOption((option) =>
            option.setName('limit').setDescription('How many places to show').setMinValue(1).setMaxValue(25)
          ),
      // Register to specific guild if GUILD_ID is set (dev mode), otherwise register globally
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      // Defer reply immediately to prevent timeout
      await interaction.deferReply();

      const limit = interaction.options.getInteger('limit') ?? LEADERBOARD_CONFIG.DEFAULT_LIMIT;
      const { leaderboardService } = this.container;

      const [topUsers, ownRank] = await Promise.all([
        leaderboardService.getTop(limit),
        leaderboardService.getRank(interaction.user.id),
      ]);

      if (topUsers.length === 0) {
        await interaction.editReply({ content: '📊 Nobody has any credits yet!' });
        return;
      }

      const leaderboardLines = topUsers.map((user) => {
        const medal = user.rank === 1 ? '🥇' : user.rank === 2 ? '🥈' : user.rank === 3 ? '🥉' : `${user.rank}.`;
        // Mentions render the current display name
        return `${medal} <@${user.user_id}> · ${formatCredits(user.balance)}`;
      });

      const embed = new EmbedBuilder()
        .setColor(0xffd700)
        .setTitle(`🏆 Leaderboard - Top ${limit}`)
        .setDescription(leaderboardLines.join('\n'))
        .setFooter({ text: ownRank ? `You are #${ownRank}` : 'You are not ranked yet' })
        .setTimestamp();

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'leaderboard command');
    }
  }
}
