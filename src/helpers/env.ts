import * as dotenv from 'dotenv'
import { cleanEnv, str, num } from 'envalid'
import { cwd } from 'process'
import { homedir } from 'os'
import { resolve, join } from 'path'

dotenv.config({ path: resolve(cwd(), '.env') })

// eslint-disable-next-line node/no-process-env
export default cleanEnv(process.env, {
  DISCORD_BOT_TOKEN: str({ default: '' }), // Required only when connecting
  MURMUR_CONFIG: str({ default: join(homedir(), '.config', 'murmur', 'config.yaml') }),
  MURMUR_LOG_FILE: str({ default: join(homedir(), '.murmur.log') }), // Empty string disables logging
  MURMUR_LOG_LEVEL: str({ choices: ['debug', 'info', 'warn', 'error'], default: 'info' }),
  EDITOR: str({ default: 'vi' }),
  MURMUR_FILE_PICKER: str({ default: '' }), // Shell command printing selected paths on stdout
  MURMUR_DOWNLOAD_DIR: str({ default: join(homedir(), 'Downloads') }),
  MURMUR_PAGE_SIZE: num({ default: 10 }),
  MURMUR_CHANNEL_CAPACITY: num({ default: 1024 }),
  MURMUR_RELATION_WINDOW_MS: num({ default: 30000 }),
  MURMUR_BACKFILL: num({ default: 50 }), // Messages fetched per room on startup
})
