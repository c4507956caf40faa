/**
 * Registry of running channels, keyed by channel id.
 */

import type { IChannel } from "../../core/interfaces/channel.js";
import { errorMessage } from "../../core/errors.js";
import logger from "../../utils/logger.js";

export class ChannelRegistry {
  private channels: Map<string, IChannel> = new Map();

  /**
   * Register a channel under its name. A channel already registered under
   * that name is stopped and replaced.
   */
  async register(channel: IChannel): Promise<void> {
    const existing = this.channels.get(channel.name);
    this.channels.set(channel.name, channel);
    if (existing && existing !== channel) {
      await this.stopChannel(existing);
    }
  }

  get(name: string): IChannel | undefined {
    return this.channels.get(name);
  }

  /**
   * Stop every channel and clear the registry.
   */
  async stopAll(): Promise<void> {
    const channels = Array.from(this.channels.values());
    this.channels.clear();
    await Promise.all(channels.map((channel) => this.stopChannel(channel)));
  }

  private async stopChannel(channel: IChannel): Promise<void> {
    try {
      await channel.stop();
    } catch (error) {
      logger.error({ channel: channel.name, error: errorMessage(error) }, "Error stopping channel");
    }
  }
}
