import { SapphireClient, container, ApplicationCommandRegistries, RegisterBehavior } from '@sapphire/framework';
import { GatewayIntentBits, Partials } from 'discord.js';
import path from 'path';
import { fileURLToPath } from 'url';
import { Config } from './config.js';
import { SapphireWinstonLogger, winstonLogger } from './lib/logger.js';
import { pool, initializeDatabase, closeDatabase } from './lib/database.js';
import { PostgresKeyValueStore } from './lib/kv-store.js';
import { RetryingStore } from './lib/retry.js';
import { CreditLog } from './lib/audit.js';
import { startBackgroundJobs } from './lib/cleanup.js';
import { WalletService } from './services/WalletService.js';
import { GameStateService } from './services/GameStateService.js';
import { DuelService } from './services/DuelService.js';
import { RedBlackService } from './services/RedBlackService.js';
import { BlackjackService } from './services/BlackjackService.js';
import { CatalogService } from './services/CatalogService.js';
import { InventoryService } from './services/InventoryService.js';
import { CaseService } from './services/CaseService.js';
import { MarketService } from './services/MarketService.js';
import { HttpPriceFeed, PriceService } from './services/PriceService.js';
import { LeaderboardService } from './services/LeaderboardService.js';
import { VoiceRewardService } from './services/VoiceRewardService.js';

// Configure Sapphire to not overwrite commands unless they changed
// This prevents unnecessary command recreation and propagation delays
ApplicationCommandRegistries.setDefaultBehaviorWhenNotIdentical(RegisterBehavior.BulkOverwrite);

// Augment Sapphire's Container interface to include our services
declare module '@sapphire/pieces' {
  interface Container {
    kvStore: PostgresKeyValueStore;
    walletService: WalletService;
    gameStateService: GameStateService;
    duelService: DuelService;
    redBlackService: RedBlackService;
    blackjackService: BlackjackService;
    catalogService: CatalogService;
    inventoryService: InventoryService;
    caseService: CaseService;
    marketService: MarketService;
    priceService: PriceService;
    leaderboardService: LeaderboardService;
    voiceRewardService: VoiceRewardService;
  }
}

// Project root (one level above src/ or dist/)
const projectRoot = fileURLToPath(new URL('../', import.meta.url));

/**
 * Extended Sapphire client with the economy services
 */
class SocialCreditsClient extends SapphireClient {
  private stopBackgroundJobs: (() => void) | null = null;

  public constructor() {
    super({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.GuildVoiceStates,
      ],
      partials: [Partials.GuildMember],
      loadMessageCommandListeners: true,
      logger: {
        instance: new SapphireWinstonLogger(),
      },
      // Tell Sapphire where to find pieces (commands, listeners, preconditions)
      // When running with tsx in dev, use src/ directory
      // When running compiled code in production, use dist/ directory (current directory)
      baseUserDirectory: new URL(
        process.env.NODE_ENV === 'production' ? './' : '../src/',
        import.meta.url
      ),
    });
  }

  public override async login(token?: string): Promise<string> {
    // Initialize database before wiring services to it
    await initializeDatabase();

    const creditLog = new CreditLog(Config.discord.creditLogChannelId);
    container.kvStore = new PostgresKeyValueStore(pool);
    const store = new RetryingStore(container.kvStore);

    container.walletService = new WalletService(store, { audit: creditLog, notifier: creditLog });
    container.gameStateService = new GameStateService(container.walletService, { notifier: creditLog });
    container.duelService = new DuelService(container.walletService, container.gameStateService);
    container.redBlackService = new RedBlackService(container.walletService, container.gameStateService);
    container.blackjackService = new BlackjackService(container.walletService, container.gameStateService);

    container.catalogService = CatalogService.fromFiles(
      path.resolve(projectRoot, Config.catalog.catalogPath),
      path.resolve(projectRoot, Config.catalog.raritiesPath)
    );
    container.inventoryService = new InventoryService(store);
    container.caseService = new CaseService(
      store,
      container.walletService,
      container.inventoryService,
      container.catalogService
    );
    container.priceService = new PriceService(container.catalogService, new HttpPriceFeed(Config.prices.feedUrl));
    container.marketService = new MarketService(
      container.walletService,
      container.inventoryService,
      container.gameStateService,
      container.catalogService,
      container.priceService,
      { notifier: creditLog }
    );
    container.leaderboardService = new LeaderboardService(store);
    container.voiceRewardService = new VoiceRewardService(container.walletService);

    // First price sample before commands can quote anything
    await container.priceService.recompute();

    this.stopBackgroundJobs = startBackgroundJobs();

    return super.login(token);
  }

  public override async destroy(): Promise<void> {
    // Services exist once background jobs were started
    if (this.stopBackgroundJobs) {
      this.stopBackgroundJobs();
      this.stopBackgroundJobs = null;
      // Return escrowed credits of open sessions before the pool closes
      await container.gameStateService.shutdown();
    }
    await closeDatabase();
    return super.destroy();
  }
}

// Create and login bot
const client = new SocialCreditsClient();

async function shutdown(signal: string): Promise<void> {
  winstonLogger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    await client.destroy();
    process.exit(0);
  } catch (error) {
    winstonLogger.error('Error during shutdown:', error);
    process.exit(1);
  }
}

// Handle process signals for graceful shutdown
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

// Handle unhandled rejections
process.on('unhandledRejection', (error) => {
  winstonLogger.error('Unhandled rejection:', error);
});

// Login
client.login(Config.discord.token).catch((error: unknown) => {
  client.logger.error('Failed to login:', error);
  process.exit(1);
});
