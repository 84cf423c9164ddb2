import { DevnetOptions } from './devnet/devnet';
import { isAddress } from './ledger/address';
import { LogLevel, parseLogLevel } from './logging/structured-logger';
import { DEFAULT_CONVERSION_POLICY } from './marketplace/marketplace-config';
import { DEFAULT_RELAY_FEE_MODEL } from './relay/in-memory-relay';

export interface NodeConfig {
  port: number;
  logLevel: LogLevel;
  devnet: DevnetOptions;
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n${problems.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

type Env = Record<string, string | undefined>;

class EnvReader {
  readonly problems: string[] = [];
  private env: Env;

  constructor(env: Env) {
    this.env = env;
  }

  private raw(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  int(name: string, fallback: number, min: number, max: number): number {
    const raw = this.raw(name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      this.problems.push(`${name} must be an integer in [${min}, ${max}], got "${raw}"`);
      return fallback;
    }
    return value;
  }

  bigint(name: string, fallback: bigint): bigint {
    const raw = this.raw(name);
    if (raw === undefined) return fallback;
    if (!/^\d+$/.test(raw)) {
      this.problems.push(`${name} must be a non-negative integer, got "${raw}"`);
      return fallback;
    }
    return BigInt(raw);
  }

  address(name: string): string | undefined {
    const raw = this.raw(name);
    if (raw === undefined) return undefined;
    if (!isAddress(raw)) {
      this.problems.push(`${name} must be a 0x-prefixed 20-byte address, got "${raw}"`);
      return undefined;
    }
    return raw.toLowerCase();
  }

  logLevel(name: string, fallback: LogLevel): LogLevel {
    const raw = this.raw(name);
    if (raw === undefined) return fallback;
    const level = parseLogLevel(raw);
    if (level === undefined) {
      this.problems.push(`${name} must be one of debug, info, warn, error, got "${raw}"`);
      return fallback;
    }
    return level;
  }
}

/**
 * Read the node configuration from environment variables. Every malformed
 * variable is collected and reported in one ConfigError.
 */
export function loadNodeConfig(env: Env = process.env): NodeConfig {
  const r = new EnvReader(env);

  const port = r.int('MARKET_PORT', 3000, 1, 65535);
  const logLevel = r.logLevel('MARKET_LOG_LEVEL', LogLevel.INFO);
  const owner = r.address('MARKET_OWNER');
  const homeChainId = r.int('MARKET_HOME_CHAIN_ID', 101, 1, 2 ** 31 - 1);
  const remoteChainId = r.int('MARKET_REMOTE_CHAIN_ID', 102, 1, 2 ** 31 - 1);
  if (homeChainId === remoteChainId) {
    r.problems.push(`MARKET_HOME_CHAIN_ID and MARKET_REMOTE_CHAIN_ID must differ (both ${homeChainId})`);
  }

  const feeBps = r.int('MARKET_FEE_BPS', 250, 0, 10_000);
  const conversion = {
    roundTripCostBps: r.int('MARKET_ROUND_TRIP_COST_BPS', DEFAULT_CONVERSION_POLICY.roundTripCostBps, 0, 9_999),
    toleranceBps: r.int('MARKET_TOLERANCE_BPS', DEFAULT_CONVERSION_POLICY.toleranceBps, 0, 9_999),
    poolFee: r.int('MARKET_POOL_FEE', DEFAULT_CONVERSION_POLICY.poolFee, 0, 999_999),
    swapDeadlineSeconds: r.int(
      'MARKET_SWAP_DEADLINE_SECONDS',
      DEFAULT_CONVERSION_POLICY.swapDeadlineSeconds,
      1,
      7 * 24 * 60 * 60
    ),
  };
  const relayFeeModel = {
    baseFee: r.bigint('MARKET_RELAY_BASE_FEE', DEFAULT_RELAY_FEE_MODEL.baseFee),
    perByteFee: r.bigint('MARKET_RELAY_PER_BYTE_FEE', DEFAULT_RELAY_FEE_MODEL.perByteFee),
  };

  if (r.problems.length > 0) {
    throw new ConfigError(r.problems);
  }

  return {
    port,
    logLevel,
    devnet: {
      chains: [
        { chainId: homeChainId, name: 'home' },
        { chainId: remoteChainId, name: 'remote' },
      ],
      owner,
      feeBps,
      conversion,
      relayFeeModel,
    },
  };
}
