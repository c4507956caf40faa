/**
 * Queue infrastructure exports.
 */

export { MessageBus, AsyncQueue } from "./message-bus.js";
export { createInboundMessage } from "./events.js";
