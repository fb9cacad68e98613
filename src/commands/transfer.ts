import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder } from 'discord.js';
import { Config } from '../config.js';
import { formatCredits } from '../lib/utils.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * Transfer command - Send credits to another user
 */
@ApplyOptions<Command.Options>({
  name: 'transfer',
  description: 'Send social credits to another user',
})
export class TransferCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addUserOption((option) =>
            option.setName('user').setDescription('The user to send credits to').setRequired(true)
          )
          .addIntegerOption((option) =>
            option.setName('amount').setDescription('Amount of credits to send').setRequired(true).setMinValue(1)
          ),
      // Register to specific guild if GUILD_ID is set (dev mode), otherwise register globally
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      // Defer reply immediately to prevent timeout
      await interaction.deferReply();

      const recipient = interaction.options.getUser('user', true);
      const amount = interaction.options.getInteger('amount', true);

      // Prevent sending to bots
      if (recipient.bot) {
        await interaction.editReply({ content: '❌ You cannot send credits to bots' });
        return;
      }

      // Self-transfers and overdrafts are rejected by the ledger
      const result = await this.container.walletService.transfer(interaction.user.id, recipient.id, amount);

      const embed = new EmbedBuilder()
        .setColor(0x00ff00)
        .setTitle('💸 Credits Sent')
        .setDescription(`${interaction.user.username} sent **${formatCredits(amount)}** to ${recipient.username}`)
        .addFields(
          {
            name: 'Your New Balance',
            value: formatCredits(result.senderBalance),
            inline: true,
          },
          {
            name: `${recipient.username}'s New Balance`,
            value: formatCredits(result.receiverBalance),
            inline: true,
          }
        )
        .setTimestamp();

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'transfer command');
    }
  }
}
