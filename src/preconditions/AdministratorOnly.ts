import { Precondition } from '@sapphire/framework';
import { PermissionFlagsBits } from 'discord.js';
import type { CommandInteraction, ContextMenuCommandInteraction, Message, PermissionsBitField } from 'discord.js';
import { Config } from '../config.js';

/**
 * Precondition to restrict commands to bot admins (ADMIN_IDS) and server administrators
 */
export class AdministratorOnlyPrecondition extends Precondition {
  public override async messageRun(message: Message) {
    return this.checkAdmin(message.author.id, message.member?.permissions);
  }

  public override async chatInputRun(interaction: CommandInteraction) {
    return this.checkAdmin(interaction.user.id, interaction.memberPermissions);
  }

  public override async contextMenuRun(interaction: ContextMenuCommandInteraction) {
    return this.checkAdmin(interaction.user.id, interaction.memberPermissions);
  }

  private checkAdmin(userId: string, permissions: Readonly<PermissionsBitField> | null | undefined) {
    if (Config.admins.includes(userId) || permissions?.has(PermissionFlagsBits.Administrator)) {
      return this.ok();
    }

    return this.error({
      message: 'This command is restricted to bot administrators.',
    });
  }
}

declare module '@sapphire/framework' {
  interface Preconditions {
    AdministratorOnly: never;
  }
}
