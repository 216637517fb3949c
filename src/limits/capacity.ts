import { env } from '../env';
import { log } from '../log';
import { getRedisClient } from '../redis/client';

const LUA_CAPACITY_SCRIPT = `
local globalKey = KEYS[1]

local callId = ARGV[1]
local globalCap = tonumber(ARGV[2])
local ttlSeconds = tonumber(ARGV[3])

if redis.call('SISMEMBER', globalKey, callId) == 1 then
  redis.call('EXPIRE', globalKey, ttlSeconds)
  return 'OK'
end

local globalCount = redis.call('SCARD', globalKey)
if globalCount >= globalCap then
  return 'global_at_capacity'
end

redis.call('SADD', globalKey, callId)
redis.call('EXPIRE', globalKey, ttlSeconds)
return 'OK'
`;

export type CapacityFailureReason = 'global_at_capacity' | 'capacity_unavailable';

export type CapacityResult = { ok: true } | { ok: false; reason: CapacityFailureReason };

/** The Redis commands the capacity gate uses; an ioredis client satisfies it. */
export interface CapacityRedis {
  evalsha(sha: string, numKeys: number, ...args: string[]): Promise<unknown>;
  script(subcommand: 'LOAD', script: string): Promise<unknown>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  srem(key: string, ...members: string[]): Promise<number>;
}

export interface CapacityParams {
  callId: string;
  redis?: CapacityRedis;
  globalCap?: number;
}

let scriptSha: string | null = null;

export function globalActiveKey(): string {
  return `${env.CAP_PREFIX}:global:active`;
}

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

async function evalCapacityScript(redis: CapacityRedis, keys: string[], args: string[]): Promise<unknown> {
  if (scriptSha) {
    try {
      return await redis.evalsha(scriptSha, keys.length, ...keys, ...args);
    } catch (error) {
      if (!isNoScriptError(error)) {
        throw error;
      }
    }
  }

  try {
    const loadedSha = String(await redis.script('LOAD', LUA_CAPACITY_SCRIPT));
    scriptSha = loadedSha;
    return await redis.evalsha(loadedSha, keys.length, ...keys, ...args);
  } catch (error) {
    log.debug({ err: error, event: 'capacity_script_load_failed' }, 'falling back to EVAL');
    return redis.eval(LUA_CAPACITY_SCRIPT, keys.length, ...keys, ...args);
  }
}

export async function tryAcquire(params: CapacityParams): Promise<CapacityResult> {
  if (!env.CAPACITY_ENABLED) {
    return { ok: true };
  }

  const redis = params.redis ?? getRedisClient();
  const args = [
    params.callId,
    String(params.globalCap ?? env.GLOBAL_CONCURRENCY_CAP),
    String(env.CAPACITY_TTL_SECONDS),
  ];

  let result: unknown;
  try {
    result = await evalCapacityScript(redis, [globalActiveKey()], args);
  } catch (error) {
    log.error({ err: error, event: 'capacity_eval_failed', call_id: params.callId }, 'capacity evaluation failed');
    throw error;
  }

  if (result === 'OK') {
    log.info({ event: 'capacity_acquired', call_id: params.callId }, 'capacity acquired');
    return { ok: true };
  }

  if (result === 'global_at_capacity') {
    log.warn({ event: 'capacity_denied', reason: result, call_id: params.callId }, 'capacity denied');
    return { ok: false, reason: 'global_at_capacity' };
  }

  log.error({ event: 'capacity_unknown_result', result, call_id: params.callId }, 'capacity returned unknown result');
  return { ok: false, reason: 'capacity_unavailable' };
}

export async function release(params: CapacityParams): Promise<void> {
  if (!env.CAPACITY_ENABLED) {
    return;
  }

  const redis = params.redis ?? getRedisClient();
  try {
    const removed = await redis.srem(globalActiveKey(), params.callId);
    log.info({ event: 'capacity_released', call_id: params.callId, removed }, 'capacity released');
  } catch (error) {
    log.error({ event: 'capacity_release_failed', err: error, call_id: params.callId }, 'capacity release failed');
  }
}
