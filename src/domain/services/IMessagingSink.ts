/**
 * Outbound text messages to a chat channel.
 */
export interface IMessagingSink {
  /**
   * @throws {DeliveryError} if the message could not be delivered
   */
  send(channelId: string, text: string): Promise<void>;
}
