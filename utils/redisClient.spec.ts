import { RedisConnection, RedisKeyValueStore } from './redisClient';

describe('RedisKeyValueStore', () => {
  let client: {
    isReady: boolean;
    get: jest.Mock;
    set: jest.Mock;
    del: jest.Mock;
    eval: jest.Mock;
    ping: jest.Mock;
  };
  let store: RedisKeyValueStore;

  beforeEach(() => {
    client = {
      isReady: true,
      get: jest.fn(),
      set: jest.fn().mockResolvedValue('OK'),
      del: jest.fn(),
      eval: jest.fn(),
      ping: jest.fn(),
    };
    store = new RedisKeyValueStore(client as unknown as RedisConnection);
  });

  describe('hitWindow', () => {
    it('runs the window script with string arguments and the window in ms', async () => {
      client.eval.mockResolvedValue([1, 1, 60000]);

      await expect(store.hitWindow('ratelimit:10.0.0.1', 5, 60)).resolves.toEqual({
        count: 1,
        allowed: true,
        resetInMs: 60000,
      });
      expect(client.eval).toHaveBeenCalledWith(expect.stringContaining("redis.call('INCR', KEYS[1])"), {
        keys: ['ratelimit:10.0.0.1'],
        arguments: ['5', '60000'],
      });
    });

    it('decodes a blocked reply', async () => {
      client.eval.mockResolvedValue([5, 0, 12000]);

      await expect(store.hitWindow('ratelimit:10.0.0.1', 5, 60)).resolves.toEqual({
        count: 5,
        allowed: false,
        resetInMs: 12000,
      });
    });

    it('falls back to the full window when the key has no ttl', async () => {
      client.eval.mockResolvedValue([3, 1, -1]);

      const hit = await store.hitWindow('ratelimit:10.0.0.1', 5, 60);

      expect(hit.resetInMs).toBe(60000);
    });

    it('rejects a reply that is not a three-element array', async () => {
      client.eval.mockResolvedValue('OK');

      await expect(store.hitWindow('ratelimit:10.0.0.1', 5, 60)).rejects.toThrow('Unexpected rate window reply: "OK"');
    });

    it('rejects a reply with non-numeric fields', async () => {
      client.eval.mockResolvedValue([1, 'yes', 60000]);

      await expect(store.hitWindow('ratelimit:10.0.0.1', 5, 60)).rejects.toThrow(
        'Unexpected rate window reply: [1,"yes",60000]'
      );
    });
  });

  describe('cache operations', () => {
    it('reads values through', async () => {
      client.get.mockResolvedValue('{"city":"Lima"}');

      await expect(store.get('weather:lima')).resolves.toBe('{"city":"Lima"}');
      expect(client.get).toHaveBeenCalledWith('weather:lima');
    });

    it('writes values with an expiry in seconds', async () => {
      await store.set('weather:lima', '{}', 600);

      expect(client.set).toHaveBeenCalledWith('weather:lima', '{}', { EX: 600 });
    });

    it('reports whether a key was removed', async () => {
      client.del.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

      await expect(store.del('weather:lima')).resolves.toBe(true);
      await expect(store.del('weather:lima')).resolves.toBe(false);
    });
  });

  describe('ping', () => {
    it('is false without sending a command while the client is not ready', async () => {
      client.isReady = false;

      await expect(store.ping()).resolves.toBe(false);
      expect(client.ping).not.toHaveBeenCalled();
    });

    it('is true on PONG', async () => {
      client.ping.mockResolvedValue('PONG');

      await expect(store.ping()).resolves.toBe(true);
    });

    it('is false when the command fails', async () => {
      client.ping.mockRejectedValue(new Error('Socket closed unexpectedly'));

      await expect(store.ping()).resolves.toBe(false);
    });
  });
});
