import { describe, it, expect } from 'vitest';
import { ChatType } from '../../constants.js';
import { Emoji, getSourceEmoji } from '../emoji.js';

describe('getSourceEmoji', () => {
  it('should map user chats to the user symbol', () => {
    expect(getSourceEmoji(ChatType.User)).toBe('👤');
  });

  it('should map group chats to the group symbol', () => {
    expect(getSourceEmoji(ChatType.Group)).toBe('👥');
  });

  it('should map system chats to the system symbol', () => {
    expect(getSourceEmoji(ChatType.System)).toBe('💻');
  });

  it('should fall back to the unknown symbol', () => {
    expect(getSourceEmoji(ChatType.Unknown)).toBe(Emoji.UNKNOWN);
    expect(getSourceEmoji('Channel')).toBe(Emoji.UNKNOWN);
    expect(getSourceEmoji('')).toBe(Emoji.UNKNOWN);
    expect(getSourceEmoji('user')).toBe(Emoji.UNKNOWN);
  });

  it('should keep the link symbol out of the lookup', () => {
    const symbols = [ChatType.User, ChatType.Group, ChatType.System, ChatType.Unknown].map(getSourceEmoji);
    expect(symbols).not.toContain(Emoji.LINK);
  });
});
