import { Channel, Client } from 'discord.js';
import { IMessagingSink } from '../../domain/services/IMessagingSink';
import { DeliveryError, toError } from '../../domain/common/Errors';

/**
 * Posts plain text messages to a Discord channel.
 */
export class DiscordMessagingSink implements IMessagingSink {
  constructor(private client: Client) {}

  async send(channelId: string, text: string): Promise<void> {
    let channel: Channel | null;
    try {
      channel = await this.client.channels.fetch(channelId);
    } catch (err) {
      throw new DeliveryError(`Failed to fetch channel ${channelId}`, { cause: toError(err).message });
    }

    if (!channel || !channel.isSendable()) {
      throw new DeliveryError(`Channel ${channelId} cannot receive messages`);
    }

    try {
      await channel.send(text);
    } catch (err) {
      throw new DeliveryError(`Failed to send message to channel ${channelId}`, { cause: toError(err).message });
    }
  }
}
