import { createHash } from "node:crypto";
import { createClient } from "redis";
import { trackEvent, trackException } from "./telemetry";

const redisUrl = process.env.REDIS_URL?.trim();
const redisKey = process.env.REDIS_KEY?.trim();

const isConfigured = Boolean(redisUrl && redisKey);

type CacheClient = ReturnType<typeof createClient>;

let client: CacheClient | null = null;
let connectPromise: Promise<CacheClient | null> | null = null;

function keyPrefix(key: string): string {
  const [prefix] = key.split(":");
  return prefix || "unknown";
}

async function getClient(): Promise<CacheClient | null> {
  if (!isConfigured) {
    return null;
  }

  if (client?.isOpen) {
    return client;
  }

  if (connectPromise) {
    return connectPromise;
  }

  const nextClient = createClient({ url: redisUrl, password: redisKey });

  nextClient.on("error", (error) => {
    trackException(error, { component: "redis", operation: "client.error" });
  });

  connectPromise = nextClient
    .connect()
    .then(() => {
      client = nextClient;
      trackEvent("cache.redis.connected");
      return nextClient;
    })
    .catch((error: unknown) => {
      trackException(error, { component: "redis", operation: "connect" });
      return null;
    })
    .finally(() => {
      connectPromise = null;
    });

  return connectPromise;
}

/** Cache key for the dominant colors of an image at a given k and scale. */
export function extractionCacheKey(image: Buffer, k: number, maxSide: number): string {
  const digest = createHash("sha256").update(image).digest("hex").slice(0, 32);
  return `colors:${k}:${maxSide}:${digest}`;
}

/**
 * Reads a cached JSON value. The caller supplies a guard because the stored
 * shape may predate the current one.
 */
export async function cacheGetJson<T>(key: string, isValid: (value: unknown) => value is T): Promise<T | null> {
  const redis = await getClient();
  if (!redis) return null;

  try {
    const raw = await redis.get(key);
    if (!raw) {
      return null;
    }
    const parsed: unknown = JSON.parse(raw);
    return isValid(parsed) ? parsed : null;
  } catch (error) {
    trackException(error, { component: "redis", operation: "get", keyPrefix: keyPrefix(key) });
    return null;
  }
}

export async function cacheSetJson(key: string, value: unknown, ttlSeconds: number): Promise<void> {
  const redis = await getClient();
  if (!redis) return;

  try {
    await redis.set(key, JSON.stringify(value), { EX: ttlSeconds });
  } catch (error) {
    trackException(error, {
      component: "redis",
      operation: "set",
      keyPrefix: keyPrefix(key),
      ttlSeconds,
    });
  }
}
