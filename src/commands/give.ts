import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder, MessageFlags } from 'discord.js';
import { Config } from '../config.js';
import { LedgerReason } from '../constants.js';
import { formatCredits } from '../lib/utils.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * Give command - Grant or remove credits (admins only)
 * Negative amounts take credits away; balances never go below zero
 */
@ApplyOptions<Command.Options>({
  name: 'give',
  description: 'Grant or remove social credits (Admin only)',
  preconditions: ['AdministratorOnly'],
})
export class GiveCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addUserOption((option) => option.setName('user').setDescription('Recipient').setRequired(true))
          .addIntegerOption((option) =>
            option.setName('amount').setDescription('Credits to add (negative to remove)').setRequired(true)
          )
          .addStringOption((option) => option.setName('reason').setDescription('Shown in the credit log')),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      const target = interaction.options.getUser('user', true);
      const amount = interaction.options.getInteger('amount', true);
      const reason = interaction.options.getString('reason') ?? 'No reason given';

      if (amount === 0) {
        await interaction.reply({ content: '❌ Amount cannot be 0', flags: MessageFlags.Ephemeral });
        return;
      }

      await interaction.deferReply();

      const balance = await this.container.walletService.adjust(target.id, amount, LedgerReason.ADMIN_GRANT);
      this.container.logger.info(`Admin grant: ${interaction.user.id} gave ${amount} to ${target.id} (${reason})`);

      const embed = new EmbedBuilder()
        .setColor(amount > 0 ? 0x2ecc71 : 0xe74c3c)
        .setTitle(amount > 0 ? '🎁 Credits granted' : '⚖️ Credits removed')
        .setDescription(
          `<@${target.id}> ${amount > 0 ? 'received' : 'lost'} **${formatCredits(Math.abs(amount))}**\n> ${reason}`
        )
        .setFooter({ text: `New balance: ${balance.toLocaleString('en-US')}` })
        .setTimestamp();

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'give command');
    }
  }
}
