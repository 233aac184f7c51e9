/**
 * Tests for Discord types and response schemas.
 */

import {
  ChannelType,
  MessageSchema,
  ChannelSchema,
  RoleSchema,
  channelScope,
  messageScope,
} from '../index.js';

describe('response schemas', () => {
  it('should accept a message and keep unknown fields', () => {
    const result = MessageSchema.safeParse({
      id: '1',
      channel_id: '2',
      content: 'hi',
      timestamp: '2024-01-01T00:00:00.000Z',
      flags: 0,
    });

    expect(result.success).toBe(true);
    expect(result.success && result.data.channel_id).toBe('2');
  });

  it('should reject a message without a channel', () => {
    expect(MessageSchema.safeParse({ id: '1', content: 'hi', timestamp: 'x' }).success).toBe(false);
  });

  it('should read channel types', () => {
    const result = ChannelSchema.safeParse({ id: '1', type: 0, guild_id: '9' });

    expect(result.success && result.data.type).toBe(ChannelType.GuildText);
  });

  it('should accept roles without a guild id', () => {
    expect(RoleSchema.safeParse({ id: '3', name: 'mods' }).success).toBe(true);
  });
});

describe('rate limit scopes', () => {
  it('should tag scope objects', () => {
    expect(channelScope({ id: '1' })).toEqual({ type: 'channel', channel: { id: '1' } });
    expect(messageScope({ id: '2', channel_id: '1' })).toEqual({
      type: 'message',
      message: { id: '2', channel_id: '1' },
    });
  });
});
