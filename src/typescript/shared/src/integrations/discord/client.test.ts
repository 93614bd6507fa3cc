import { DiscordWebhookClient } from './client';
import { DeliveryError } from '../../errors';

describe('DiscordWebhookClient', () => {
  let fetchMock: jest.SpyInstance;
  const message = {
    content: 'Ada Runner: Morning Run (Run) 5.00 km in 25:00',
    embeds: [{ title: 'Morning Run', color: 0xfc4c02 }],
  };

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('posts the message and returns the created id', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ id: '1100', channel_id: '9' }), { status: 200 }));
    const client = new DiscordWebhookClient('https://discord.test/api/webhooks/1/test-token');

    const id = await client.send(message);

    expect(id).toBe('1100');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url.toString()).toBe('https://discord.test/api/webhooks/1/test-token?wait=true');
    expect(JSON.parse(init.body)).toEqual({
      content: 'Ada Runner: Morning Run (Run) 5.00 km in 25:00',
      username: 'Strava Webhook',
      avatar_url: 'https://d3nn82uaxijpm6.cloudfront.net/mstile-144x144.png',
      embeds: [{ title: 'Morning Run', color: 0xfc4c02 }],
    });
  });

  it('throws DeliveryError with the status on rejection', async () => {
    fetchMock.mockResolvedValue(new Response('{"message":"Unknown Webhook"}', { status: 404 }));
    const client = new DiscordWebhookClient('https://discord.test/api/webhooks/1/test-token');

    const error = await client.send(message).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({ status: 404, message: 'Discord webhook returned 404: {"message":"Unknown Webhook"}' });
  });

  it('throws DeliveryError when unreachable', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const client = new DiscordWebhookClient('https://discord.test/api/webhooks/1/test-token');

    await expect(client.send(message)).rejects.toThrow('Discord webhook unreachable');
  });
});
