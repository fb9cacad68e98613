import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { Config } from '../config.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * End blackjack command - close a player's table (admins only)
 * A bet in play is returned.
 */
@ApplyOptions<Command.Options>({
  name: 'endblackjack',
  description: "End a player's blackjack game (Admin only)",
  preconditions: ['AdministratorOnly'],
})
export class EndBlackjackCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addUserOption((option) => option.setName('user').setDescription('Player whose game to end').setRequired(true)),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      const target = interaction.options.getUser('user', true);
      await interaction.deferReply();

      const ended = await this.container.blackjackService.endGame(target.id);
      if (ended) {
        this.container.logger.info(`Admin ${interaction.user.id} ended the blackjack game of ${target.id}`);
      }

      await interaction.editReply({
        content: ended
          ? `✅ Blackjack game of <@${target.id}> ended. Any bet in play was returned.`
          : `❌ <@${target.id}> has no blackjack game.`,
      });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'endblackjack command');
    }
  }
}
