import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { loadConfig, validateConfig } from '../../src/config.js';
import { makeConfig } from '../helpers/config.js';
import { testChain } from '../helpers/fake-chain-adapter.js';

const ENV_KEYS = [
  'CHAIN_ID',
  'RPC_URL',
  'RPC_URL_BACKUP',
  'RPC_WS_URL',
  'PRIVATE_RELAY_URL',
  'RPC_URL_BASE',
  'RPC_WS_URL_BASE',
  'PRIVATE_RELAY_URL_BASE',
  'BOT_TIER',
  'DRY_RUN',
  'AUTO_TRADE_ENABLED',
  'REDIS_URL',
  'REDIS_ENABLED',
  'DB_PATH',
];

const YAML = `
active_chain_id: 8453
chains:
  - id: 8453
    name: Base
    rpc_urls: ["http://127.0.0.1:8545"]
    router: "0x1000000000000000000000000000000000000001"
    factory: "0x1000000000000000000000000000000000000002"
    wrapped_native: "0x1000000000000000000000000000000000000003"
    eip1559: true
    relay_url: "http://127.0.0.1:9000"
  - name: missing-id
trading:
  risk_tolerance: Reckless
  tier: vip
  default_slippage: 2.5
  dry_run: false
bot:
  lock_timeout_ms: "soon"
`;

describe('loadConfig', () => {
  let dir: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'snipebot-config-'));
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  function write(content: string): string {
    const file = join(dir, 'config.yaml');
    writeFileSync(file, content);
    return file;
  }

  it('should read chains and sections from YAML', () => {
    const config = loadConfig(write(YAML));

    expect(config.activeChainId).toBe(8453);
    expect(config.chains).toHaveLength(1);
    expect(config.chains[0]).toMatchObject({
      id: 8453,
      name: 'base',
      symbol: 'ETH',
      rpcUrls: ['http://127.0.0.1:8545'],
      relayUrl: 'http://127.0.0.1:9000',
      blockTimeMs: 12_000,
    });
    expect(config.trading.defaultSlippage).toBe(2.5);
    expect(config.trading.tier).toBe('vip');
  });

  it('should fall back to defaults for unknown or mistyped values', () => {
    const config = loadConfig(write(YAML));

    expect(config.trading.riskTolerance).toBe('Medium');
    expect(config.bot.lockTimeoutMs).toBe(5_000);
    expect(config.redis).toEqual({ enabled: false, url: 'redis://localhost:6379' });
  });

  it('should let the environment override the file', () => {
    process.env.RPC_URL = 'http://127.0.0.1:1111';
    process.env.RPC_URL_BACKUP = 'http://127.0.0.1:2222';
    process.env.PRIVATE_RELAY_URL = '';
    process.env.DRY_RUN = '1';
    process.env.BOT_TIER = 'premium';

    const config = loadConfig(write(YAML));

    expect(config.chains[0]?.rpcUrls).toEqual(['http://127.0.0.1:1111', 'http://127.0.0.1:2222']);
    expect(config.chains[0]?.relayUrl).toBeUndefined();
    expect(config.trading.dryRun).toBe(true);
    expect(config.trading.tier).toBe('premium');
  });

  it('should take per-chain endpoints from suffixed variables', () => {
    process.env.RPC_URL_BASE = 'http://127.0.0.1:3333,http://127.0.0.1:4444';

    expect(loadConfig(write(YAML)).chains[0]?.rpcUrls).toEqual(['http://127.0.0.1:3333', 'http://127.0.0.1:4444']);
  });

  it('should use built-in defaults when the file is missing or broken', () => {
    const missing = loadConfig(join(dir, 'absent.yaml'));
    const broken = loadConfig(write('trading: [unclosed'));

    for (const config of [missing, broken]) {
      expect(config.activeChainId).toBe(1);
      expect(config.chains).toEqual([]);
      expect(config.strategy.trials).toBe(1_000);
    }
  });

  it('should load the shipped configuration', () => {
    const config = loadConfig(resolve('config', 'default.yaml'));

    expect(config.chains.map((c) => c.id)).toContain(1);
    expect(config.chains.find((c) => c.id === 1)?.relayUrl).toBe('https://relay.flashbots.net');
  });
});

describe('validateConfig', () => {
  const valid = () =>
    makeConfig((c) => {
      c.wallet.privateKey = 'test-secret';
    });

  it('should accept a complete configuration', () => {
    expect(validateConfig(valid())).toEqual([]);
  });

  it('should require a wallet key and an RPC endpoint', () => {
    const config = makeConfig((c) => {
      c.chains = [testChain({ rpcUrls: [] })];
    });

    expect(validateConfig(config)).toEqual(['RPC_URL is required for testnet', 'PRIVATE_KEY is required']);
  });

  it('should name a missing active chain and malformed addresses', () => {
    expect(validateConfig({ ...valid(), activeChainId: 5 })).toEqual(['active chain 5 is not configured']);

    const config = valid();
    config.chains = [testChain({ router: 'router' })];
    expect(validateConfig(config)).toEqual(['testnet.router is not an address: "router"']);
  });

  it('should check numeric ranges', () => {
    const config = valid();
    config.trading.autoTradeThreshold = 1.5;
    config.trading.reservePercent = 100;
    config.tracker.refreshConcurrency = 0;

    expect(validateConfig(config)).toEqual([
      'auto_trade_threshold must be within [0, 1]',
      'reserve_percent must be within [0, 100)',
      'refresh_concurrency must be at least 1',
    ]);
  });

  it('should want a chat id alongside a bot token', () => {
    const config = valid();
    config.telegram.enabled = true;
    config.telegram.botToken = 'test-token';

    expect(validateConfig(config)).toEqual(['TELEGRAM_CHAT_ID is required when a Telegram bot token is set']);
  });
});
