import { Precondition } from '@sapphire/framework';
import type { CommandInteraction, ContextMenuCommandInteraction, Message } from 'discord.js';
import { Config } from '../config.js';

/**
 * Precondition to restrict game commands to the casino channel (CASINO_CHANNEL_ID)
 * If no channel is configured, allows commands in all channels
 * Also allows threads that are children of the casino channel
 */
export class CasinoChannelOnlyPrecondition extends Precondition {
  public override async messageRun(message: Message) {
    if (!message.guildId) {
      return this.error({ message: 'This command can only be used in a server.' });
    }
    return this.checkChannel(message.channel);
  }

  public override async chatInputRun(interaction: CommandInteraction) {
    if (!interaction.guildId || !interaction.channel) {
      return this.error({ message: 'This command can only be used in a server.' });
    }
    return this.checkChannel(interaction.channel);
  }

  public override async contextMenuRun(interaction: ContextMenuCommandInteraction) {
    if (!interaction.guildId || !interaction.channel) {
      return this.error({ message: 'This command can only be used in a server.' });
    }
    return this.checkChannel(interaction.channel);
  }

  private checkChannel(channel: Message['channel'] | NonNullable<CommandInteraction['channel']>) {
    const casinoChannelId = Config.discord.casinoChannelId;

    // If no casino channel is configured, allow everywhere
    if (!casinoChannelId) {
      return this.ok();
    }

    if (channel.id === casinoChannelId) {
      return this.ok();
    }

    // Threads inside the casino channel count as the casino
    if (channel.isThread() && channel.parentId === casinoChannelId) {
      return this.ok();
    }

    return this.error({
      message: `This command can only be used in <#${casinoChannelId}>`,
    });
  }
}

declare module '@sapphire/framework' {
  interface Preconditions {
    CasinoChannelOnly: never;
  }
}
