import { Command } from '@sapphire/framework';
import { ApplyOptions } from '@sapphire/decorators';
import { EmbedBuilder } from 'discord.js';
import { Config } from '../config.js';
import { CASE_CONFIG } from '../constants.js';
import type { RarityTier } from '../lib/types.js';
import { formatCredits, formatDuration } from '../lib/utils.js';
import { replyWithError } from '../utils/game-utils.js';

/**
 * Case command - buy, open and browse loot cases
 */
@ApplyOptions<Command.Options>({
  name: 'case',
  description: 'Buy and open collectible cases',
  preconditions: ['CasinoChannelOnly'],
})
export class CaseCommand extends Command {
  public override registerApplicationCommands(registry: Command.Registry) {
    registry.registerChatInputCommand(
      (builder) =>
        builder
          .setName(this.name)
          .setDescription(this.description)
          .addSubcommand((sub) => sub.setName('bank').setDescription('Show the case bank stock and prices'))
          .addSubcommand((sub) =>
            sub
              .setName('buy')
              .setDescription(`Buy cases from the bank (max ${CASE_CONFIG.DAILY_PURCHASE_LIMIT} per day)`)
              .addStringOption((option) => option.setName('case').setDescription('Case ID or name').setRequired(true))
              .addIntegerOption((option) =>
                option
                  .setName('quantity')
                  .setDescription('How many cases')
                  .setMinValue(1)
                  .setMaxValue(CASE_CONFIG.DAILY_PURCHASE_LIMIT)
              )
          )
          .addSubcommand((sub) =>
            sub
              .setName('open')
              .setDescription(`Open one of your cases (max ${CASE_CONFIG.DAILY_OPEN_LIMIT} per day)`)
              .addStringOption((option) => option.setName('case').setDescription('Case ID or name').setRequired(true))
          ),
      Config.discord.guildId ? { guildIds: [Config.discord.guildId] } : {}
    );
  }

  public override async chatInputRun(interaction: Command.ChatInputCommandInteraction) {
    try {
      await interaction.deferReply();

      switch (interaction.options.getSubcommand()) {
        case 'bank':
          await this.showBank(interaction);
          break;
        case 'buy':
          await this.buy(interaction);
          break;
        case 'open':
          await this.open(interaction);
          break;
      }
    } catch (error) {
      await replyWithError(interaction, error, this.container.logger, 'case command');
    }
  }

  private async showBank(interaction: Command.ChatInputCommandInteraction) {
    const bank = await this.container.caseService.getBank();
    const nextRefillMs =
      new Date(bank.lastRefilled).getTime() + CASE_CONFIG.BANK_REFILL_HOURS * 60 * 60 * 1000 - Date.now();

    const lines = this.container.catalogService.listCases().map((caseDef) => {
      const stock = bank.stock[caseDef.id] ?? 0;
      return `📦 **${caseDef.name}** (\`${caseDef.id}\`) — ${formatCredits(caseDef.price)} · ${stock} left`;
    });

    const embed = new EmbedBuilder()
      .setColor(0x3498db)
      .setTitle('🏦 Case Bank')
      .setDescription(lines.length > 0 ? lines.join('\n') : 'No cases are for sale.')
      .setFooter({ text: `Restock in ${formatDuration(Math.max(0, Math.floor(nextRefillMs / 1000)))}` });

    await interaction.editReply({ embeds: [embed] });
  }

  private async buy(interaction: Command.ChatInputCommandInteraction) {
    const query = interaction.options.getString('case', true);
    const quantity = interaction.options.getInteger('quantity') ?? 1;

    const result = await this.container.caseService.buyCase(interaction.user.id, query, quantity);

    const embed = new EmbedBuilder()
      .setColor(0x2ecc71)
      .setTitle('🛒 Purchase complete')
      .setDescription(
        `You bought **${result.quantity}× ${result.caseDef.name}** for **${formatCredits(result.cost)}**.\n` +
          `Open it with \`/case open case:${result.caseDef.id}\`.`
      )
      .setFooter({ text: `Balance: ${result.balance.toLocaleString('en-US')} · Bank stock left: ${result.stockLeft}` });

    await interaction.editReply({ embeds: [embed] });
  }

  private async open(interaction: Command.ChatInputCommandInteraction) {
    const query = interaction.options.getString('case', true);
    const result = await this.container.caseService.openCase(interaction.user.id, query);

    const lines = result.drops.map(({ item, rarity, isNew }) => {
      const badge = isNew ? ' 🆕' : '';
      return `${rarity?.emoji ?? '▫️'} **${item.name}** · ${item.rarity}${badge}\n> ${item.description}`;
    });

    // Embed color follows the rarest drop
    const rarities = this.container.catalogService.rarities;
    const rarest = result.drops
      .map((drop) => drop.rarity)
      .filter((tier): tier is RarityTier => tier !== undefined)
      .sort((a, b) => rarities.indexOf(b) - rarities.indexOf(a))[0];

    const embed = new EmbedBuilder()
      .setColor(rarest?.color ?? 0xffffff)
      .setTitle(`🎁 ${result.caseDef.name}`)
      .setDescription(lines.join('\n\n'))
      .setFooter({
        text:
          result.opensLeft === null
            ? `${result.casesLeft} left · today's open count could not be updated`
            : `${result.casesLeft} left · ${result.opensLeft} opens left today`,
      })
      .setTimestamp();

    await interaction.editReply({ embeds: [embed] });
  }
}
