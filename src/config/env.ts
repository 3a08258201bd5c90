import { cleanEnv, str } from 'envalid';

export const env = cleanEnv(process.env, {
  // LOGGING
  LOG_LEVEL: str({ choices: ['error', 'warn', 'info', 'debug'], default: 'warn' }),
  LOG_FILE: str({ default: '' }),

  // SETTINGS
  BLACKJACK_SETTINGS: str({ default: 'game_settings.json' }),

  // NODE_ENV
  NODE_ENV: str({ choices: ['development', 'production', 'test'], default: 'development' }),
});
