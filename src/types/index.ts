/**
 * Discord types - public exports.
 */

export { Snowflake } from './snowflake.js';

export {
  ChannelType,
  User,
  Channel,
  Message,
  Guild,
  Role,
  Webhook,
  RateLimitScope,
  channelScope,
  messageScope,
  guildScope,
  roleScope,
  webhookScope,
} from './entities.js';

export {
  UserSchema,
  ChannelSchema,
  MessageSchema,
  GuildSchema,
  RoleSchema,
  WebhookSchema,
  EmptySchema,
  ApiErrorBodySchema,
} from './schemas.js';
