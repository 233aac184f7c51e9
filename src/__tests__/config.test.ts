/**
 * Tests for Discord configuration.
 */

import {
  DiscordConfigBuilder,
  SecretString,
  parseWebhookUrl,
  buildWebhookUrl,
  DISCORD_API_BASE_URL,
  DEFAULT_RATE_LIMIT_CONFIG,
  NoAuthenticationError,
  ConfigurationError,
  InvalidWebhookUrlError,
} from '../index.js';

const WEBHOOK_URL = 'https://discord.com/api/webhooks/123456789012345678/test-secret';

describe('SecretString', () => {
  it('should hide the value in strings and JSON', () => {
    const secret = new SecretString('test-secret');

    expect(String(secret)).toBe('[REDACTED]');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"[REDACTED]"}');
    expect(secret.expose()).toBe('test-secret');
  });
});

describe('DiscordConfigBuilder', () => {
  it('should build with a bot token and defaults', () => {
    const config = new DiscordConfigBuilder().withBotToken('  test-secret  ').build();

    expect(config.botToken?.expose()).toBe('test-secret');
    expect(config.defaultWebhookUrl).toBeUndefined();
    expect(config.baseUrl).toBe(DISCORD_API_BASE_URL);
    expect(config.rateLimitConfig).toEqual(DEFAULT_RATE_LIMIT_CONFIG);
    expect(config.rateLimitConfig).toEqual({
      enabled: true,
      optimisticCooldownMs: 1000,
      maxOptimisticParallelism: 50,
    });
  });

  it('should build with a webhook URL only', () => {
    const config = new DiscordConfigBuilder().withWebhook(WEBHOOK_URL).build();

    expect(config.defaultWebhookUrl?.expose()).toBe(WEBHOOK_URL);
    expect(config.botToken).toBeUndefined();
  });

  it('should require some form of authentication', () => {
    expect(() => new DiscordConfigBuilder().build()).toThrow(NoAuthenticationError);
  });

  it('should reject empty tokens and malformed webhook URLs', () => {
    expect(() => new DiscordConfigBuilder().withBotToken('   ')).toThrow(ConfigurationError);
    expect(() => new DiscordConfigBuilder().withWebhook('https://example.com/hook')).toThrow(
      InvalidWebhookUrlError
    );
  });

  it('should merge partial rate limit settings', () => {
    const config = new DiscordConfigBuilder()
      .withBotToken('test-secret')
      .withRateLimitConfig({ maxOptimisticParallelism: 10 })
      .build();

    expect(config.rateLimitConfig).toEqual({
      enabled: true,
      optimisticCooldownMs: 1000,
      maxOptimisticParallelism: 10,
    });
  });

  it('should validate ranges on build', () => {
    const builder = new DiscordConfigBuilder()
      .withBotToken('test-secret')
      .withRateLimitConfig({ optimisticCooldownMs: 0 });

    expect(() => builder.build()).toThrow(ConfigurationError);
    expect(() => builder.build()).toThrow('config.rateLimitConfig.optimisticCooldownMs');
  });

  it('should reject a backoff that starts above its cap', () => {
    const builder = new DiscordConfigBuilder()
      .withBotToken('test-secret')
      .withRetryConfig({ initialBackoffMs: 5000, maxBackoffMs: 1000 });

    expect(() => builder.build()).toThrow('initialBackoffMs must not exceed maxBackoffMs');
  });

  it('should require an HTTPS base URL', () => {
    const builder = new DiscordConfigBuilder()
      .withBotToken('test-secret')
      .withBaseUrl('http://localhost:8080/api');

    expect(() => builder.build()).toThrow('config.baseUrl: must be HTTPS');
  });

  it('should strip a trailing slash from the base URL', () => {
    const config = new DiscordConfigBuilder()
      .withBotToken('test-secret')
      .withBaseUrl('https://discord.test/api/v10/')
      .build();

    expect(config.baseUrl).toBe('https://discord.test/api/v10');
  });

  describe('fromEnv', () => {
    it('should read credentials and switches', () => {
      const config = DiscordConfigBuilder.fromEnv({
        DISCORD_BOT_TOKEN: 'test-secret',
        DISCORD_WEBHOOK_URL: WEBHOOK_URL,
        DISCORD_RATE_LIMIT_ENABLED: 'false',
      }).build();

      expect(config.botToken?.expose()).toBe('test-secret');
      expect(config.defaultWebhookUrl?.expose()).toBe(WEBHOOK_URL);
      expect(config.rateLimitConfig.enabled).toBe(false);
    });

    it('should leave unset variables at their defaults', () => {
      const config = DiscordConfigBuilder.fromEnv({ DISCORD_BOT_TOKEN: 'test-secret' }).build();

      expect(config.baseUrl).toBe(DISCORD_API_BASE_URL);
      expect(config.rateLimitConfig.enabled).toBe(true);
    });
  });
});

describe('webhook URLs', () => {
  it('should split a webhook URL into id and token', () => {
    expect(parseWebhookUrl(WEBHOOK_URL)).toEqual({
      webhookId: '123456789012345678',
      webhookToken: 'test-secret',
    });
  });

  it('should accept versioned and legacy hosts', () => {
    expect(
      parseWebhookUrl('https://discordapp.com/api/v10/webhooks/42/test-secret').webhookId
    ).toBe('42');
  });

  it('should reject other URLs', () => {
    expect(() => parseWebhookUrl('https://discord.com/api/channels/42')).toThrow(
      InvalidWebhookUrlError
    );
  });

  it('should build a webhook URL', () => {
    expect(buildWebhookUrl('42', 'test-secret')).toBe(
      'https://discord.com/api/v10/webhooks/42/test-secret'
    );
  });
});
