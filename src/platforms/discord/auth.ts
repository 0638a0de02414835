/**
 * Discord authentication and connection management
 */

import { Client, Events, IntentsBitField, Partials } from 'discord.js'
import config from '@/helpers/env'

/**
 * Create and configure a Discord client with required intents
 */
export function createDiscordClient(): Client {
  return new Client({
    intents: [
      IntentsBitField.Flags.Guilds,
      IntentsBitField.Flags.GuildMessages,
      IntentsBitField.Flags.DirectMessages,
      IntentsBitField.Flags.MessageContent,
      IntentsBitField.Flags.GuildMessageReactions,
      IntentsBitField.Flags.DirectMessageReactions,
    ],
    // Reactions and deletes on uncached messages still arrive
    partials: [Partials.Message, Partials.Channel, Partials.Reaction, Partials.User],
  })
}

/**
 * Authenticate and connect to Discord
 */
export async function connectDiscord(client: Client, token: string = config.DISCORD_BOT_TOKEN): Promise<void> {
  if (!token) {
    throw new Error('DISCORD_BOT_TOKEN is not set (see .env.example)')
  }

  return new Promise((resolve, reject) => {
    client.once(Events.ClientReady, () => {
      resolve()
    })

    client.once(Events.Error, (error) => {
      reject(error)
    })

    client.login(token).catch(reject)
  })
}

/**
 * Disconnect from Discord
 */
export async function disconnectDiscord(client: Client): Promise<void> {
  await client.destroy()
}
