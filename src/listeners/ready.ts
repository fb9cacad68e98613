import { Listener } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { safeLogger as logger } from '../lib/safe-logger.js';

/**
 * Ready listener - Fires when the bot successfully connects to Discord
 * Starts voice rewards for users who were already in a voice channel
 */
@ApplyOptions<Listener.Options>({
  event: 'clientReady',
  once: true, // Only run once on startup
})
export class ReadyListener extends Listener {
  public override async run() {
    try {
      const { client } = this.container;

      // Startup banner
      logger.info('═══════════════════════════════════════════════════════════');
      logger.info('                 💳 SOCIAL CREDITS 💳                      ');
      logger.info('═══════════════════════════════════════════════════════════');
      logger.info(`Bot User:        ${client.user?.tag}`);
      logger.info(`Bot ID:          ${client.user?.id}`);
      logger.info(`Environment:     ${process.env.NODE_ENV || 'development'}`);
      logger.info(`Node Version:    ${process.version}`);
      logger.info(`Guilds:          ${client.guilds.cache.size}`);
      logger.info(`Commands:        ${client.stores.get('commands').size}`);
      logger.info(`Catalog:         ${this.container.catalogService.listItems().length} items`);
      logger.info('───────────────────────────────────────────────────────────');

      // Voice presence is in memory only: pick up everyone already connected
      let tracked = 0;
      for (const guild of client.guilds.cache.values()) {
        for (const state of guild.voiceStates.cache.values()) {
          if (state.channelId && state.channelId !== guild.afkChannelId && !state.member?.user.bot) {
            this.container.voiceRewardService.join(state.id);
            tracked++;
          }
        }
      }

      logger.info(`Voice:           ${tracked} users in voice channels`);
      logger.info('═══════════════════════════════════════════════════════════');
      logger.info('✅ Social credits bot is online');
      logger.info('═══════════════════════════════════════════════════════════');
    } catch (error) {
      logger.error('Error in ready listener:', error);
    }
  }
}
