/**
 * Channels infrastructure exports.
 */

export { BaseChannel, type BaseChannelConfig } from "./base.js";
export {
  TelegramChannel,
  nextOffset,
  DEFAULT_TELEGRAM_API_BASE,
  type TelegramChannelConfig,
  type TelegramChannelOptions,
  type TelegramUpdate,
} from "./telegram.js";
export { ChannelRegistry } from "./registry.js";
