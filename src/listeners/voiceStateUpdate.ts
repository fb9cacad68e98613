import { Listener } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { VoiceState } from 'discord.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

/**
 * VoiceStateUpdate listener - Fires when a user's voice state changes
 * Handles: joining voice, leaving voice, switching channels, mute/deafen (ignored)
 *
 * Bots and Discord's built-in AFK channel earn nothing.
 */
@ApplyOptions<Listener.Options>({
  event: 'voiceStateUpdate',
})
export class VoiceStateUpdateListener extends Listener {
  public override async run(oldState: VoiceState, newState: VoiceState) {
    try {
      if (newState.member?.user.bot) {
        return;
      }

      const userId = newState.id;
      const afkChannelId = newState.guild.afkChannelId;

      const wasInVoice = oldState.channelId !== null && oldState.channelId !== afkChannelId;
      const isInVoice = newState.channelId !== null && newState.channelId !== afkChannelId;

      // Joined voice (a channel switch keeps the running presence)
      if (!wasInVoice && isInVoice) {
        logger.debug(`User ${userId} joined voice channel ${newState.channelId}`);
        this.container.voiceRewardService.join(userId);
        return;
      }

      // Left voice: pay the remaining full minutes
      if (wasInVoice && !isInVoice) {
        const paid = await this.container.voiceRewardService.leave(userId);
        logger.debug(`User ${userId} left voice (${paid} credits on leave)`);
      }
    } catch (error) {
      logger.error('Error handling voiceStateUpdate:', error);
      // Don't throw - this is a listener, errors should not crash the bot
    }
  }
}
