/**
 * Response schemas for the entities the client returns.
 *
 * Unknown fields pass through untouched; only the modelled ones are checked.
 */

import { z } from 'zod';
import { ChannelType, User, Channel, Message, Guild, Role, Webhook } from './entities.js';

const snowflake = z.string().regex(/^\d+$/);

export const UserSchema: z.ZodType<User, z.ZodTypeDef, unknown> = z
  .object({
    id: snowflake,
    username: z.string(),
    discriminator: z.string(),
    global_name: z.string().nullable().optional(),
    avatar: z.string().nullable().optional(),
    bot: z.boolean().optional(),
  })
  .passthrough();

export const ChannelSchema: z.ZodType<Channel, z.ZodTypeDef, unknown> = z
  .object({
    id: snowflake,
    type: z.nativeEnum(ChannelType),
    guild_id: snowflake.optional(),
    name: z.string().optional(),
    topic: z.string().nullable().optional(),
    nsfw: z.boolean().optional(),
    parent_id: snowflake.nullable().optional(),
    rate_limit_per_user: z.number().int().optional(),
  })
  .passthrough();

export const MessageSchema: z.ZodType<Message, z.ZodTypeDef, unknown> = z
  .object({
    id: snowflake,
    channel_id: snowflake,
    guild_id: snowflake.optional(),
    author: UserSchema.optional(),
    content: z.string(),
    timestamp: z.string(),
    edited_timestamp: z.string().nullable().optional(),
    pinned: z.boolean().optional(),
  })
  .passthrough();

export const GuildSchema: z.ZodType<Guild, z.ZodTypeDef, unknown> = z
  .object({
    id: snowflake,
    name: z.string(),
    owner_id: snowflake.optional(),
    icon: z.string().nullable().optional(),
  })
  .passthrough();

export const RoleSchema: z.ZodType<Role, z.ZodTypeDef, unknown> = z
  .object({
    id: snowflake,
    guild_id: snowflake.optional(),
    name: z.string(),
    color: z.number().int().optional(),
    hoist: z.boolean().optional(),
    permissions: z.string().optional(),
    mentionable: z.boolean().optional(),
  })
  .passthrough();

export const WebhookSchema: z.ZodType<Webhook, z.ZodTypeDef, unknown> = z
  .object({
    id: snowflake,
    guild_id: snowflake.nullable().optional(),
    channel_id: snowflake.nullable().optional(),
    name: z.string().nullable().optional(),
    token: z.string().optional(),
  })
  .passthrough();

/** Bodies of 204 responses and of requests whose result is ignored */
export const EmptySchema = z.unknown();

/** Discord's JSON error body */
export const ApiErrorBodySchema = z
  .object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.record(z.unknown()).optional(),
    retry_after: z.number().optional(),
    global: z.boolean().optional(),
  })
  .passthrough();
