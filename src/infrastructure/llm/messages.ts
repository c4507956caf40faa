/**
 * Helpers for reading CoreMessage content.
 */

import type { CoreMessage } from "ai";

/**
 * Plain text of a message: text parts joined, tool results serialized.
 */
export function messageText(message: CoreMessage): string {
  if (typeof message.content === "string") {
    return message.content;
  }

  const parts: string[] = [];
  for (const part of message.content) {
    if (part.type === "text") {
      parts.push(part.text);
    } else if (part.type === "tool-result") {
      parts.push(typeof part.result === "string" ? part.result : JSON.stringify(part.result));
    }
  }
  return parts.join("");
}
