/**
 * Redis Connection Tests
 * Unit tests for Redis connection manager
 */

import Redis from 'ioredis';
import { RedisConnection } from '../redis.connection';

// Mock ioredis
jest.mock('ioredis');

describe('RedisConnection', () => {
  let mockRedisInstance: any;
  let connection: RedisConnection;

  beforeEach(() => {
    jest.clearAllMocks();
    mockRedisInstance = {
      status: 'ready',
      on: jest.fn(),
      ping: jest.fn().mockResolvedValue('PONG'),
      quit: jest.fn().mockResolvedValue('OK'),
    };
    (Redis as jest.MockedClass<typeof Redis>).mockImplementation(() => mockRedisInstance);
    connection = new RedisConnection();
  });

  afterEach(async () => {
    await connection.disconnect();
  });

  describe('connect', () => {
    it('should create the client from env defaults', () => {
      const client = connection.connect();

      expect(client).toBe(mockRedisInstance);
      expect(Redis).toHaveBeenCalledWith(
        'redis://localhost:6379',
        expect.objectContaining({ db: 0, maxRetriesPerRequest: 3, enableReadyCheck: true })
      );
    });

    it('should create the client only once', () => {
      connection.connect();
      connection.connect();
      expect(Redis).toHaveBeenCalledTimes(1);
    });

    it('should use explicit configuration over env', () => {
      connection = new RedisConnection({
        url: 'redis://cache.test:6380',
        db: 2,
        password: 'test-secret',
        maxRetriesPerRequest: 1,
      });
      connection.connect();

      expect(Redis).toHaveBeenCalledWith(
        'redis://cache.test:6380',
        expect.objectContaining({ db: 2, password: 'test-secret', maxRetriesPerRequest: 1 })
      );
    });

    it('should not send a password when none is configured', () => {
      connection.connect();
      const options = (Redis as jest.MockedClass<typeof Redis>).mock.calls[0][1];
      expect(options).not.toHaveProperty('password');
    });

    it('should set up event handlers on connection', () => {
      connection.connect();

      expect(mockRedisInstance.on).toHaveBeenCalledWith('connect', expect.any(Function));
      expect(mockRedisInstance.on).toHaveBeenCalledWith('ready', expect.any(Function));
      expect(mockRedisInstance.on).toHaveBeenCalledWith('error', expect.any(Function));
      expect(mockRedisInstance.on).toHaveBeenCalledWith('close', expect.any(Function));
      expect(mockRedisInstance.on).toHaveBeenCalledWith('reconnecting', expect.any(Function));
    });
  });

  describe('healthCheck', () => {
    it('should return false before connecting', async () => {
      expect(await connection.healthCheck()).toBe(false);
    });

    it('should return true when Redis responds to ping', async () => {
      connection.connect();
      expect(await connection.healthCheck()).toBe(true);
    });

    it('should return false when Redis ping fails', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      mockRedisInstance.ping.mockRejectedValue(new Error('Connection failed'));
      connection.connect();

      expect(await connection.healthCheck()).toBe(false);
      expect(errorSpy).toHaveBeenCalledWith('Redis health check failed:', 'Connection failed');
      errorSpy.mockRestore();
    });
  });

  describe('isAvailable', () => {
    it('should return true when Redis is ready', () => {
      connection.connect();
      expect(connection.isAvailable()).toBe(true);
    });

    it('should return false when Redis is not ready', () => {
      mockRedisInstance.status = 'end';
      connection.connect();
      expect(connection.isAvailable()).toBe(false);
    });

    it('should return false before connecting', () => {
      expect(connection.isAvailable()).toBe(false);
    });
  });

  describe('disconnect', () => {
    it('should quit and allow a fresh connection afterwards', async () => {
      connection.connect();
      await connection.disconnect();

      expect(mockRedisInstance.quit).toHaveBeenCalledTimes(1);
      expect(connection.isAvailable()).toBe(false);

      connection.connect();
      expect(Redis).toHaveBeenCalledTimes(2);
    });

    it('should handle disconnect when no client exists', async () => {
      await expect(connection.disconnect()).resolves.toBeUndefined();
      expect(mockRedisInstance.quit).not.toHaveBeenCalled();
    });
  });
});
