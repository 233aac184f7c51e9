/**
 * Tests for the Discord client and the transport underneath it.
 */

import {
  DiscordClient,
  DiscordConfigBuilder,
  ManualScheduler,
  InMemoryLogger,
  InMemoryMetricsCollector,
  MetricNames,
  channelScope,
  ValidationError,
  NetworkError,
  RateLimitedError,
  NoAuthenticationError,
  ConfigurationError,
  RateLimitScopeError,
  RateLimitWaitAbortedError,
  NotFoundError,
} from '../index.js';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const CHANNEL = { id: '100', guild_id: '300' };
const MESSAGE = { id: '200', channel_id: '100' };
const WEBHOOK_URL = 'https://discord.com/api/webhooks/42/test-secret';

const MESSAGE_BODY = {
  id: '200',
  channel_id: '100',
  content: 'hello',
  timestamp: '2024-01-01T00:00:00.000Z',
};

function jsonResponse(
  body: unknown,
  options: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: options.status ?? 200,
    headers: { 'content-type': 'application/json', ...options.headers },
  });
}

function setup(configure: (builder: DiscordConfigBuilder) => DiscordConfigBuilder = (b) => b) {
  const scheduler = new ManualScheduler();
  const logger = new InMemoryLogger();
  const metrics = new InMemoryMetricsCollector();
  const fetch = jest.fn<Promise<Response>, [string, RequestInit]>();
  const builder = new DiscordConfigBuilder()
    .withBotToken('test-secret')
    .withRetryConfig({ maxRetries: 0 });
  const client = DiscordClient.fromBuilder(configure(builder), {
    scheduler,
    logger,
    metrics,
    fetch,
  });
  return { client, scheduler, logger, metrics, fetch };
}

function requestAt(fetch: jest.Mock<Promise<Response>, [string, RequestInit]>, index: number) {
  const [url, init] = fetch.mock.calls[index];
  return { url, init, headers: new Headers(init.headers) };
}

describe('DiscordClient', () => {
  describe('requests', () => {
    it('should send an authenticated request and validate the response', async () => {
      const { client, fetch, metrics } = setup();
      fetch.mockResolvedValue(jsonResponse(MESSAGE_BODY));

      const message = await client.sendMessage(CHANNEL, { content: 'hello', replyTo: '150' });

      expect(message.id).toBe('200');
      expect(message.content).toBe('hello');

      const { url, init, headers } = requestAt(fetch, 0);
      expect(url).toBe('https://discord.com/api/v10/channels/100/messages');
      expect(init.method).toBe('POST');
      expect(headers.get('Authorization')).toBe('Bot test-secret');
      expect(headers.get('User-Agent')).toBe('DiscordBot (discord-rest-ratelimit, 0.1.0)');
      expect(JSON.parse(String(init.body))).toEqual({
        content: 'hello',
        message_reference: { message_id: '150', fail_if_not_exists: false },
      });

      expect(
        metrics.getCounter(MetricNames.REQUESTS_TOTAL, { operation: 'message:send', method: 'POST' })
      ).toBe(1);
      expect(metrics.getCounter(MetricNames.REQUESTS_SUCCESS, { operation: 'message:send' })).toBe(1);
    });

    it('should reject invalid content before sending', async () => {
      const { client, fetch } = setup();

      await expect(client.sendMessage(CHANNEL, { content: '' })).rejects.toThrow(
        'Validation failed: Content cannot be empty'
      );
      await expect(client.sendMessage(CHANNEL, { content: 'x'.repeat(2001) })).rejects.toThrow(
        'Content exceeds 2000 characters'
      );
      expect(fetch).not.toHaveBeenCalled();
    });

    it('should reject response bodies that do not match the schema', async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValue(jsonResponse({ id: '1' }));

      const result = client.getCurrentUser();

      await expect(result).rejects.toBeInstanceOf(ValidationError);
      await expect(result).rejects.toThrow('response.username: Required');
    });

    it('should map error statuses onto error types', async () => {
      const { client, fetch, logger } = setup();
      fetch.mockResolvedValue(jsonResponse({ message: 'Unknown Guild', code: 10004 }, { status: 404 }));

      await expect(client.getGuild({ id: '300' })).rejects.toBeInstanceOf(NotFoundError);
      expect(logger.getLogs().map((record) => record.message)).toContain('Discord request failed');
    });

    it('should require a bot token for bot endpoints', async () => {
      const scheduler = new ManualScheduler();
      const fetch = jest.fn<Promise<Response>, [string, RequestInit]>();
      const client = DiscordClient.fromBuilder(new DiscordConfigBuilder().withWebhook(WEBHOOK_URL), {
        scheduler,
        fetch,
      });

      await expect(client.getCurrentUser()).rejects.toBeInstanceOf(NoAuthenticationError);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('should send the audit log reason URL-encoded', async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValue(new Response(null, { status: 204 }));

      await client.deleteMessage(MESSAGE, 'spam cleanup');

      const { url, init, headers } = requestAt(fetch, 0);
      expect(url).toBe('https://discord.com/api/v10/channels/100/messages/200');
      expect(init.method).toBe('DELETE');
      expect(headers.get('X-Audit-Log-Reason')).toBe('spam%20cleanup');
    });

    it('should encode emoji in reaction paths', async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValue(new Response(null, { status: 204 }));

      await client.addReaction(MESSAGE, 'party:123');

      expect(requestAt(fetch, 0).url).toBe(
        'https://discord.com/api/v10/channels/100/messages/200/reactions/party%3A123/@me'
      );
    });

    it('should attach the guild id to created roles', async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValue(jsonResponse({ id: '400', name: 'mods' }));

      const role = await client.createRole({ id: '300' }, { name: 'mods' });

      expect(role).toEqual({ id: '400', name: 'mods', guild_id: '300' });
    });

    it('should refuse to edit a role without a guild', async () => {
      const { client, fetch } = setup();

      await expect(client.editRole({ id: '400' }, { name: 'admins' })).rejects.toBeInstanceOf(
        RateLimitScopeError
      );
      expect(fetch).not.toHaveBeenCalled();
    });
  });

  describe('webhooks', () => {
    it('should execute the default webhook without a bot token', async () => {
      const { client, fetch } = setup((builder) => builder.withWebhook(WEBHOOK_URL));
      fetch.mockResolvedValue(new Response(null, { status: 204 }));

      const result = await client.executeWebhook({ content: 'hello', username: 'relay' });

      expect(result).toBeUndefined();
      const { url, init, headers } = requestAt(fetch, 0);
      expect(url).toBe('https://discord.com/api/v10/webhooks/42/test-secret');
      expect(headers.get('Authorization')).toBeNull();
      expect(JSON.parse(String(init.body))).toEqual({ content: 'hello', username: 'relay' });
    });

    it('should return the created message when waiting', async () => {
      const { client, fetch } = setup((builder) => builder.withWebhook(WEBHOOK_URL));
      fetch.mockResolvedValue(jsonResponse(MESSAGE_BODY));

      const message = await client.executeWebhook({ content: 'hello', wait: true, threadId: '7' });

      expect(message?.id).toBe('200');
      expect(requestAt(fetch, 0).url).toBe(
        'https://discord.com/api/v10/webhooks/42/test-secret?wait=true&thread_id=7'
      );
    });

    it('should fail without a webhook URL', async () => {
      const { client } = setup();

      await expect(client.executeWebhook({ content: 'hello' })).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });

  describe('rate limiting', () => {
    const limitHeaders = {
      'X-RateLimit-Limit': '1',
      'X-RateLimit-Remaining': '0',
      'X-RateLimit-Reset-After': '1',
    };

    it('should record a cooldown from the response headers', async () => {
      const { client, fetch, scheduler } = setup();
      fetch.mockResolvedValue(
        jsonResponse(MESSAGE_BODY, {
          headers: {
            'X-RateLimit-Limit': '5',
            'X-RateLimit-Remaining': '4',
            'X-RateLimit-Reset-After': '2.5',
          },
        })
      );

      await client.sendMessage(CHANNEL, { content: 'hello' });

      const proxy = client.rateLimitProxy('messageCreate', channelScope(CHANNEL));
      expect(proxy.isAlive()).toBe(true);
      expect(proxy.size).toBe(5);
      expect(proxy.usedCount).toBe(1);
      expect(proxy.freeCount).toBe(4);
      expect(proxy.nextResetAfter).toBe(2500);

      scheduler.advance(2500);

      expect(proxy.isAlive()).toBe(false);
      expect(client.getRateLimitStats().handlerCount).toBe(0);
    });

    it('should queue requests until the cooldown expires', async () => {
      const { client, fetch, scheduler, metrics } = setup();
      fetch.mockImplementation(async () => jsonResponse(MESSAGE_BODY, { headers: limitHeaders }));

      const first = client.sendMessage(CHANNEL, { content: 'one' });
      const second = client.sendMessage(CHANNEL, { content: 'two' });
      await first;
      await flush();

      expect(fetch).toHaveBeenCalledTimes(1);
      const proxy = client.rateLimitProxy('messageCreate', channelScope(CHANNEL));
      expect(proxy.waitingCount).toBe(1);

      scheduler.advance(1000);
      await second;

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(JSON.parse(String(requestAt(fetch, 1).init.body))).toEqual({ content: 'two' });
      expect(metrics.getHistogram(MetricNames.RATE_LIMIT_WAIT, { operation: 'message:send' })).toEqual([
        1,
      ]);
    });

    it('should keep separate channels independent', async () => {
      const { client, fetch } = setup();
      fetch.mockImplementation(async () => jsonResponse(MESSAGE_BODY, { headers: limitHeaders }));

      await client.sendMessage(CHANNEL, { content: 'one' });
      await client.sendMessage({ id: '101' }, { content: 'two' });

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(client.getRateLimitStats().handlerCount).toBe(2);
    });

    it('should free the slot when the request fails without a response', async () => {
      const { client, fetch } = setup();
      fetch.mockRejectedValue(new TypeError('fetch failed'));

      await expect(client.sendMessage(CHANNEL, { content: 'hello' })).rejects.toThrow(NetworkError);

      expect(client.getRateLimitStats().handlerCount).toBe(0);
    });

    it('should hold every request back after a global rate limit', async () => {
      const { client, fetch, scheduler, metrics } = setup();
      fetch.mockResolvedValueOnce(
        jsonResponse(
          { message: 'You are being rate limited.', retry_after: 1.5, global: true },
          { status: 429 }
        )
      );
      fetch.mockResolvedValueOnce(
        jsonResponse({ id: '1', username: 'bot', discriminator: '0' })
      );

      await expect(client.sendMessage(CHANNEL, { content: 'hello' })).rejects.toBeInstanceOf(
        RateLimitedError
      );
      expect(client.getRateLimitStats().globalLockRemainingMs).toBe(1500);
      expect(metrics.getCounter(MetricNames.RATE_LIMITS_HIT, { scope: 'global' })).toBe(1);
      expect(metrics.getCounter(MetricNames.GLOBAL_LOCKS)).toBe(1);

      const user = client.getCurrentUser();
      await flush();
      expect(fetch).toHaveBeenCalledTimes(1);

      scheduler.advance(1500);
      await expect(user).resolves.toEqual({ id: '1', username: 'bot', discriminator: '0' });
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('should bypass the limiter when rate limiting is disabled', async () => {
      const { client, fetch } = setup((builder) =>
        builder.withRateLimitConfig({ enabled: false })
      );
      fetch.mockImplementation(async () => jsonResponse(MESSAGE_BODY, { headers: limitHeaders }));

      await client.sendMessage(CHANNEL, { content: 'one' });
      await client.sendMessage(CHANNEL, { content: 'two' });

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(client.getRateLimitStats().handlerCount).toBe(0);
    });

    it('should reject queued requests on close', async () => {
      const { client, fetch, logger } = setup();
      fetch.mockImplementation(async () => jsonResponse(MESSAGE_BODY, { headers: limitHeaders }));

      await client.sendMessage(CHANNEL, { content: 'one' });
      const queued = client.sendMessage(CHANNEL, { content: 'two' });
      await flush();

      client.close();

      await expect(queued).rejects.toBeInstanceOf(RateLimitWaitAbortedError);
      expect(client.getRateLimitStats().handlerCount).toBe(0);
      const closed = logger.getLogs().find((record) => record.message === 'Discord client closed');
      expect(closed?.context).toEqual({ handlers: 1, queuedRequests: 1 });
    });
  });
});
