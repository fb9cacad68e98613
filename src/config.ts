import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  GUILD_ID: z.string().optional(), // Optional: for development/single-server mode
  CASINO_CHANNEL_ID: z.string().optional(), // Optional: restrict game commands to one channel
  CREDIT_LOG_CHANNEL_ID: z.string().optional(), // Optional: audit + operator notices channel
  ADMIN_IDS: z.string().default(''), // Comma-separated Discord user IDs
  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: z.string().default('5432'),
  DATABASE_NAME: z.string().default('socialcredits'),
  DATABASE_USER: z.string().default('socialcredits'),
  DATABASE_PASSWORD: z.string().min(1, 'DATABASE_PASSWORD is required'),
  CATALOG_PATH: z.string().optional(),
  RARITIES_PATH: z.string().optional(),
  PRICE_FEED_URL: z.string().url().default('https://api.coinbase.com/v2/prices/BTC-USD/spot'),
  NODE_ENV: z.enum(['development', 'production']).default('development'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  throw new Error('Invalid environment variables');
}

export const env = parsed.data;

export const Config = {
  discord: {
    token: env.DISCORD_TOKEN,
    // Optional: Only used for development/single-server mode
    // For multi-guild bots, register commands globally
    guildId: env.GUILD_ID,
    casinoChannelId: env.CASINO_CHANNEL_ID,
    creditLogChannelId: env.CREDIT_LOG_CHANNEL_ID,
  },
  admins: env.ADMIN_IDS.split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0),
  database: {
    host: env.DATABASE_HOST,
    port: parseInt(env.DATABASE_PORT, 10),
    database: env.DATABASE_NAME,
    user: env.DATABASE_USER,
    password: env.DATABASE_PASSWORD,
  },
  catalog: {
    // Resolved against the project root when relative
    catalogPath: env.CATALOG_PATH ?? 'data/catalog.json',
    raritiesPath: env.RARITIES_PATH ?? 'data/rarities.json',
  },
  prices: {
    feedUrl: env.PRICE_FEED_URL,
  },
  bot: {
    isDevelopment: env.NODE_ENV === 'development',
  },
} as const;
