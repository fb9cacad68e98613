import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder, type ChatInputCommandInteraction } from 'discord.js';
import { Config } from '../config.js';
import { GameKind } from '../constants.js';
import type { GameCounters } from '../lib/types.js';
import { formatCredits } from '../lib/utils.js';
import { replyWithError } from '../utils/game-utils.js';

const GAME_NAMES: Record<GameKind, string> = {
  [GameKind.DUEL]: '⚔️ Duel',
  [GameKind.REDBLACK]: '🔴 Red or Black',
  [GameKind.BLACKJACK]: '🃏 Blackjack',
};

@ApplyOptions<Command.Options>({
  name: 'stats',
  description: 'Show social credit balance, rank and game record',
})
export class StatsCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addUserOption((option) =>
            option
              .setName('member')
              .setDescription('The member to view stats for (defaults to you)')
              .setRequired(false)
          ),
      // Register to specific guild if GUILD_ID is set (dev mode), otherwise register globally
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: ChatInputCommandInteraction) {
    try {
      await interaction.deferReply();

      const targetUser = interaction.options.getUser('member') ?? interaction.user;
      const [account, rank] = await Promise.all([
        this.container.walletService.getAccount(targetUser.id),
        this.container.leaderboardService.getRank(targetUser.id),
      ]);

      const embed = new EmbedBuilder()
        .setTitle(`📈 ${targetUser.username}'s Stats`)
        .setColor(0x00ff00)
        .addFields({
          name: '📊 Summary',
          value: `Balance: **${formatCredits(account.balance)}**\nRank: **${rank ? `#${rank}` : 'unranked'}**`,
          inline: false,
        });

      let anyGames = false;
      for (const game of Object.values(GameKind)) {
        const counters = account.stats[game];
        if (!counters || counters.played === 0) continue;
        anyGames = true;
        embed.addFields({ name: GAME_NAMES[game], value: this.formatCounters(counters), inline: true });
      }

      if (!anyGames) {
        embed.setFooter({ text: 'No games played yet' });
      }

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'stats command');
    }
  }

  private formatCounters({ played, won }: GameCounters): string {
    const lost = played - won;
    const winPct = played > 0 ? ((won / played) * 100).toFixed(1) : '0.0';
    const lossPct = played > 0 ? ((lost / played) * 100).toFixed(1) : '0.0';

    return (
      `Played: **${played.toLocaleString('en-US')}**\n` +
      `W: **${won.toLocaleString('en-US')}** (${winPct}%) | L: **${lost.toLocaleString('en-US')}** (${lossPct}%)`
    );
  }
}
