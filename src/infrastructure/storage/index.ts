/**
 * Storage infrastructure exports.
 */

export { SessionStore, createMessage } from "./session-store.js";
export { BindingStore } from "./binding-store.js";
