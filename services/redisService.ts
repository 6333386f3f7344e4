import { Redis } from 'ioredis';
import { settingsService } from './settingsService.js';
import { loggerService } from './loggerService.js';

export type RedisArg = string | number;
export type RedisCommand = [string, ...RedisArg[]];

const isTestEnv = () => process.env.NODE_ENV === 'test';

// Lightweight in-memory mock to avoid real Redis connections during tests
const mockStore = new Map<string, string>();
const mockSets = new Map<string, Set<string>>();
const mockHashes = new Map<string, Map<string, string>>();

const getMockSet = (key: string): Set<string> => {
    let set = mockSets.get(key);
    if (!set) {
        set = new Set<string>();
        mockSets.set(key, set);
    }
    return set;
};

const getMockHash = (key: string): Map<string, string> => {
    let hash = mockHashes.get(key);
    if (!hash) {
        hash = new Map<string, string>();
        mockHashes.set(key, hash);
    }
    return hash;
};

const handleMockCommand = async (command: RedisCommand): Promise<unknown> => {
    const [cmd, ...rawArgs] = command;
    const args = rawArgs.map(String);
    switch (cmd.toUpperCase()) {
    case 'SMEMBERS':
        return Array.from(getMockSet(args[0]));
    case 'SADD': {
        const set = getMockSet(args[0]);
        let added = 0;
        args.slice(1).forEach((val) => {
            if (!set.has(val)) {
                set.add(val);
                added++;
            }
        });
        return added;
    }
    case 'SREM': {
        const set = getMockSet(args[0]);
        let removed = 0;
        args.slice(1).forEach((val) => {
            if (set.delete(val)) removed++;
        });
        return removed;
    }
    case 'DEL': {
        let removed = 0;
        args.forEach((key) => {
            if (mockStore.delete(key)) removed++;
            if (mockSets.delete(key)) removed++;
            if (mockHashes.delete(key)) removed++;
        });
        return removed;
    }
    case 'EXISTS':
        return mockStore.has(args[0]) || mockHashes.has(args[0]) ? 1 : 0;
    case 'GET':
        return mockStore.get(args[0]) ?? null;
    case 'SET':
        mockStore.set(args[0], args[1]);
        return 'OK';
    case 'HSET': {
        const hash = getMockHash(args[0]);
        let added = 0;
        for (let i = 1; i + 1 < args.length; i += 2) {
            if (!hash.has(args[i])) added++;
            hash.set(args[i], args[i + 1]);
        }
        return added;
    }
    case 'HGET':
        return mockHashes.get(args[0])?.get(args[1]) ?? null;
    case 'HGETALL': {
        // Raw reply shape: [field, value, field, value, ...]
        const hash = mockHashes.get(args[0]);
        return hash ? Array.from(hash.entries()).flat() : [];
    }
    case 'HDEL': {
        const hash = mockHashes.get(args[0]);
        if (!hash) return 0;
        let removed = 0;
        args.slice(1).forEach((field) => {
            if (hash.delete(field)) removed++;
        });
        return removed;
    }
    case 'HINCRBY': {
        const hash = getMockHash(args[0]);
        const next = Number.parseInt(hash.get(args[1]) ?? '0', 10) + Number.parseInt(args[2], 10);
        hash.set(args[1], String(next));
        return next;
    }
    case 'PING':
        return 'PONG';
    default:
        throw new Error(`Unsupported mock command: ${cmd}`);
    }
};

let client: Redis | null = null;

const normalizeUrl = (redisUrl: string): string => {
    // Fix common misconfiguration where http is used instead of redis protocol
    if (redisUrl.startsWith('http://')) return redisUrl.replace('http://', 'redis://');
    if (redisUrl.startsWith('https://')) return redisUrl.replace('https://', 'rediss://');
    if (!redisUrl.includes('://')) return `redis://${redisUrl}`;
    return redisUrl;
};

const getClient = (): Redis => {
    if (client) return client;

    const connectionUrl = normalizeUrl(settingsService.getRedisSettings().redisUrl);
    loggerService.info(`Initializing Redis Client with URL: ${connectionUrl}`);

    client = new Redis(connectionUrl, {
        lazyConnect: true,
        retryStrategy(times: number) {
            return Math.min(times * 50, 2000);
        },
    });

    client.on('error', (err: unknown) => {
        loggerService.error('Redis Client Error', { error: err });
    });

    client.on('connect', () => {
        loggerService.info('Redis Client Connected');
    });

    return client;
};

const ensureConnected = async (redis: Redis) => {
    if (redis.status === 'wait' || redis.status === 'end') {
        await redis.connect();
    }
};

export const redisService = {
    /**
     * Executes a Redis command given as ['CMD', arg1, arg2] and returns the raw reply.
     */
    request: async (command: RedisCommand): Promise<unknown> => {
        if (isTestEnv()) {
            return handleMockCommand(command);
        }

        const redis = getClient();
        await ensureConnected(redis);

        const [cmdName, ...args] = command;
        try {
            return await redis.call(cmdName, args);
        } catch (error) {
            loggerService.error(`Redis command failed: ${cmdName}`, { error });
            throw error;
        }
    },

    healthCheck: async (): Promise<boolean> => {
        if (isTestEnv()) return true;

        try {
            const redis = getClient();
            await ensureConnected(redis);
            return (await redis.ping()) === 'PONG';
        } catch (error) {
            loggerService.warn('Redis health check failed', { error });
            return false;
        }
    },

    disconnect: async () => {
        if (isTestEnv()) {
            __redisTestUtils.resetMock();
            return;
        }

        if (client) {
            await client.quit();
            client = null;
        }
    },
};

export const __redisTestUtils = {
    resetMock: () => {
        mockStore.clear();
        mockSets.clear();
        mockHashes.clear();
    },
};
