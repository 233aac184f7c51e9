/**
 * Minimal Discord entity shapes.
 *
 * Only the fields the client sends, returns or reads to resolve a rate
 * limit scope are modelled here.
 */

import { Snowflake } from './snowflake.js';

/**
 * Discord channel types.
 */
export enum ChannelType {
  GuildText = 0,
  DM = 1,
  GuildVoice = 2,
  GroupDM = 3,
  GuildCategory = 4,
  GuildAnnouncement = 5,
  AnnouncementThread = 10,
  PublicThread = 11,
  PrivateThread = 12,
  GuildStageVoice = 13,
  GuildForum = 15,
}

export interface User {
  id: Snowflake;
  username: string;
  /** Legacy discriminator, "0" for migrated usernames */
  discriminator: string;
  global_name?: string | null;
  avatar?: string | null;
  bot?: boolean;
}

export interface Channel {
  id: Snowflake;
  type: ChannelType;
  /** Not present for DMs */
  guild_id?: Snowflake;
  name?: string;
  topic?: string | null;
  nsfw?: boolean;
  parent_id?: Snowflake | null;
  /** Slowmode delay in seconds */
  rate_limit_per_user?: number;
}

export interface Message {
  id: Snowflake;
  channel_id: Snowflake;
  /** Only set on messages received through the gateway */
  guild_id?: Snowflake;
  author?: User;
  content: string;
  /** ISO8601 timestamp */
  timestamp: string;
  edited_timestamp?: string | null;
  pinned?: boolean;
}

export interface Guild {
  id: Snowflake;
  name: string;
  owner_id?: Snowflake;
  icon?: string | null;
}

/**
 * Role objects from the API carry no guild id, so callers attach it.
 */
export interface Role {
  id: Snowflake;
  guild_id?: Snowflake;
  name: string;
  color?: number;
  hoist?: boolean;
  permissions?: string;
  mentionable?: boolean;
}

export interface Webhook {
  id: Snowflake;
  /** Null for application-owned webhooks */
  guild_id?: Snowflake | null;
  channel_id?: Snowflake | null;
  name?: string | null;
  token?: string;
}

/**
 * An object that decides which rate limit handler a request goes through.
 */
export type RateLimitScope =
  | { type: 'channel'; channel: Pick<Channel, 'id' | 'guild_id'> }
  | { type: 'message'; message: Pick<Message, 'id' | 'channel_id' | 'guild_id'> }
  | { type: 'guild'; guild: Pick<Guild, 'id'> }
  | { type: 'role'; role: Pick<Role, 'id' | 'guild_id'> }
  | { type: 'webhook'; webhook: Pick<Webhook, 'id' | 'guild_id'> };

export function channelScope(channel: Pick<Channel, 'id' | 'guild_id'>): RateLimitScope {
  return { type: 'channel', channel };
}

export function messageScope(
  message: Pick<Message, 'id' | 'channel_id' | 'guild_id'>
): RateLimitScope {
  return { type: 'message', message };
}

export function guildScope(guild: Pick<Guild, 'id'>): RateLimitScope {
  return { type: 'guild', guild };
}

export function roleScope(role: Pick<Role, 'id' | 'guild_id'>): RateLimitScope {
  return { type: 'role', role };
}

export function webhookScope(webhook: Pick<Webhook, 'id' | 'guild_id'>): RateLimitScope {
  return { type: 'webhook', webhook };
}
