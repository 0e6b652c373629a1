import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables
config();

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_DIR: z.string().default('./logs'),
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  DOWNLOAD_DIR: z.string().min(1).default('./Video Downloads'),
  DOWNLOAD_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(900),
  // A playlist attempt covers every item, so it gets a much larger ceiling
  PLAYLIST_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(14400),
});

export type Config = z.infer<typeof configSchema>;

let appConfig: Config;

try {
  appConfig = configSchema.parse(process.env);
} catch (error) {
  if (error instanceof z.ZodError) {
    console.error('Configuration validation failed:');
    error.errors.forEach((err) => {
      console.error(`  ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }
  throw error;
}

export { appConfig as config };
