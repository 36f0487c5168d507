import { ChatType } from '../constants.js';

export const Emoji = {
  GROUP: '👥',
  USER: '👤',
  SYSTEM: '💻',
  UNKNOWN: '❓',
  LINK: '🔗'
} as const;

/**
 * Get the symbol shown next to a message source of the given chat type.
 * Anything outside User, Group and System gets the unknown symbol.
 */
export function getSourceEmoji(type: ChatType | string): string {
  switch (type) {
    case ChatType.User:
      return Emoji.USER;
    case ChatType.Group:
      return Emoji.GROUP;
    case ChatType.System:
      return Emoji.SYSTEM;
    default:
      return Emoji.UNKNOWN;
  }
}
