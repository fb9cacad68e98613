import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder, MessageFlags } from 'discord.js';
import { Config } from '../config.js';
import { applyMassOperation, parseMassOperation, parseUserIds, type MassOperation } from '../lib/mass-adjust.js';
import { replyWithError } from '../utils/game-utils.js';

function describeOperation({ mode, amount }: MassOperation): string {
  const value = amount.toLocaleString('en-US');
  if (mode === '+') return `+${value} credits`;
  if (mode === '-') return `-${value} credits`;
  return `set to ${value} credits`;
}

/**
 * Admin mass command - add, remove or set credits for several users at once
 */
@ApplyOptions<Command.Options>({
  name: 'adminmass',
  description: 'Adjust the credits of several users at once (Admin only)',
  preconditions: ['AdministratorOnly'],
})
export class AdminMassCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addStringOption((option) =>
            option.setName('operation').setDescription('+amount, -amount or =amount (e.g. +100, =0)').setRequired(true)
          )
          .addStringOption((option) =>
            option.setName('users').setDescription('Mentions or user IDs, separated by spaces').setRequired(true)
          )
          .addStringOption((option) => option.setName('reason').setDescription('Shown in the credit log')),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      const operation = parseMassOperation(interaction.options.getString('operation', true));
      const userIds = parseUserIds(interaction.options.getString('users', true));
      const reason = interaction.options.getString('reason') ?? 'No reason given';

      if (userIds.length === 0) {
        await interaction.reply({ content: '❌ Name at least one user', flags: MessageFlags.Ephemeral });
        return;
      }

      await interaction.deferReply();

      const outcomes = await applyMassOperation(this.container.walletService, userIds, operation);
      this.container.logger.info(
        `Admin mass adjustment: ${interaction.user.id} applied ${operation.mode}${operation.amount} to ${userIds.join(', ')} (${reason})`
      );

      const lines = outcomes.map((outcome) =>
        outcome.ok
          ? `✅ <@${outcome.userId}>: ${outcome.balance.toLocaleString('en-US')}`
          : `⚠️ <@${outcome.userId}>: not changed`
      );
      const failed = outcomes.filter((outcome) => !outcome.ok).length;

      const embed = new EmbedBuilder()
        .setColor(failed > 0 ? 0xe67e22 : 0x2ecc71)
        .setTitle(`⚖️ Mass adjustment: ${describeOperation(operation)}`)
        .setDescription(`${lines.join('\n').slice(0, 3900)}\n\n> ${reason}`)
        .setFooter({ text: failed > 0 ? `${failed} user(s) could not be updated` : `${outcomes.length} user(s) updated` })
        .setTimestamp();

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'adminmass command');
    }
  }
}
