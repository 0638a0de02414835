#!/usr/bin/env -S npx tsx
import 'dotenv/config'

import config from '@/helpers/env'
import { createLogger } from '@/helpers/logger'
import { errorMessage } from '@/helpers/errors'
import { Channel } from '@/core/channel'
import { createPlatformClient, isPlatformType, PLATFORM_TYPES } from '@/platforms/factory'
import { ConfigWatcher } from '@/cli/config'
import { editText, pickFiles } from '@/cli/editor'
import { openTarget, saveDownload } from '@/cli/media'
import { UiLoop, LoopMessage } from '@/cli/runtime'
import { renderApp } from '@/cli/ui/App'

const logger = createLogger('main')

function queue(channel: Channel<LoopMessage>, message: LoopMessage): void {
  channel.send(message).catch((error) => logger.error(`Could not queue ${message.type}`, error))
}

async function main(): Promise<void> {
  const platform = process.argv[2] ?? 'discord'
  if (!isPlatformType(platform)) {
    throw new Error(`Unknown platform "${platform}" (expected one of: ${PLATFORM_TYPES.join(', ')})`)
  }

  const channel = new Channel<LoopMessage>(config.MURMUR_CHANNEL_CAPACITY)
  const watcher = new ConfigWatcher(config.MURMUR_CONFIG, {
    onChange: (next) => queue(channel, { type: 'config', config: next }),
    onError: (error) => queue(channel, { type: 'configError', error }),
  })
  const initialConfig = await watcher.start()

  const client = createPlatformClient(platform)
  console.log(`Connecting to ${platform}...`)
  await client.connect()
  logger.info(`Connected as ${client.getCurrentUser()?.username ?? 'unknown'}`)

  const loop = new UiLoop({
    client,
    channel,
    config: initialConfig,
    pageSize: config.MURMUR_PAGE_SIZE,
    relationWindowMs: config.MURMUR_RELATION_WINDOW_MS,
    external: {
      editText: (initial, options) =>
        editText(initial, { editor: config.EDITOR, clearVim: options.clearVim, signal: options.signal }),
      pickFiles: (options) => pickFiles(config.MURMUR_FILE_PICKER, options),
      openTarget: (target) => openTarget(target),
      saveFile: (fileName, data) => saveDownload(config.MURMUR_DOWNLOAD_DIR, fileName, data),
    },
  })

  const rooms = await client.getRooms()
  for (const room of rooms) {
    loop.addRoom(room.id, room.parentName ? `${room.parentName} / ${room.name}` : room.name)
  }

  const app = renderApp({ loop })
  const running = loop.run()
  loop
    .startSync(
      rooms.map((room) => room.id),
      config.MURMUR_BACKFILL
    )
    .catch((error) => logger.error('Sync stopped', error))

  await app.waitUntilExit()
  watcher.stop()
  loop.stop()
  await running
  await client.disconnect()
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    logger.error('Fatal', error)
    console.error(`Fatal: ${errorMessage(error)}`)
    process.exit(1)
  })
