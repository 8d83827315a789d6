/**
 * Configuration management
 * Centralizes all environment variables and packet-filter settings
 */

import * as fs from 'fs';
import Joi from 'joi';

export type NftFamily = 'ip' | 'ip6' | 'inet';

export interface NftConfig {
  bin: string;
  family: NftFamily;
  table: string;
  preroutingChain: string;
  postroutingChain: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  portRange: { start: number; end: number };
  accessToken: string | null;
  ruleGroupPrefix: string;
  sweepOrphans: boolean;
  nft: NftConfig;
}

type Env = Record<string, string | undefined>;

// nft identifiers: letters, digits, underscore, dot, dash; must start with a letter
const NFT_IDENTIFIER = /^[A-Za-z][A-Za-z0-9_.-]*$/;

interface ParsedEnv {
  PORT: number;
  HOST: string;
  PORT_RANGE_START: number;
  PORT_RANGE_END: number;
  ACCESS_TOKEN?: string;
  NFT_BIN: string;
  NFT_FAMILY: NftFamily;
  NFT_TABLE: string;
  NFT_PREROUTING_CHAIN: string;
  NFT_POSTROUTING_CHAIN: string;
  RULE_GROUP_PREFIX: string;
  PROVIDER_TIMEOUT_MS: number;
  SWEEP_ORPHANS: boolean;
}

const envSchema = Joi.object<ParsedEnv>({
  PORT: Joi.number().integer().min(1).max(65535).default(3000),
  HOST: Joi.string().default('0.0.0.0'),
  PORT_RANGE_START: Joi.number().integer().min(1024).max(65535).default(10000),
  PORT_RANGE_END: Joi.number().integer().min(Joi.ref('PORT_RANGE_START')).max(65535).default(19999),
  ACCESS_TOKEN: Joi.string().allow('').optional(),
  NFT_BIN: Joi.string().default('nft'),
  NFT_FAMILY: Joi.string().valid('ip', 'ip6', 'inet').default('ip'),
  NFT_TABLE: Joi.string().pattern(NFT_IDENTIFIER).default('nat'),
  NFT_PREROUTING_CHAIN: Joi.string().pattern(NFT_IDENTIFIER).default('PREROUTING'),
  NFT_POSTROUTING_CHAIN: Joi.string().pattern(NFT_IDENTIFIER).default('POSTROUTING'),
  RULE_GROUP_PREFIX: Joi.string().pattern(NFT_IDENTIFIER).max(64).default('proxy_'),
  PROVIDER_TIMEOUT_MS: Joi.number().integer().min(100).max(300000).default(10000),
  SWEEP_ORPHANS: Joi.boolean().truthy('1').falsy('0').default(true),
}).unknown(true);

/**
 * Load KEY=value lines from a dotenv file into `env`.
 * Lines starting with '#' or without '=' are skipped. Variables already set
 * in the environment win over the file.
 * @returns Number of variables applied
 */
export function loadDotenv(dotenvPath = '.env', env: Env = process.env): number {
  if (!fs.existsSync(dotenvPath)) {
    return 0;
  }
  let applied = 0;
  for (const rawLine of fs.readFileSync(dotenvPath, 'utf8').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
    if (env[key] === undefined) {
      env[key] = value;
      applied++;
    }
  }
  return applied;
}

/**
 * Parse and validate configuration from environment variables.
 * @throws {Error} Listing every invalid variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });
  if (error) {
    const formatted = error.details.map(d => `  ${d.path.join('.')}: ${d.message}`).join('\n');
    throw new Error(`Configuration validation failed:\n${formatted}`);
  }
  const parsed = value;

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    portRange: { start: parsed.PORT_RANGE_START, end: parsed.PORT_RANGE_END },
    // Empty string disables auth the same way an unset variable does
    accessToken: parsed.ACCESS_TOKEN || null,
    ruleGroupPrefix: parsed.RULE_GROUP_PREFIX,
    sweepOrphans: parsed.SWEEP_ORPHANS,
    nft: {
      bin: parsed.NFT_BIN,
      family: parsed.NFT_FAMILY,
      table: parsed.NFT_TABLE,
      preroutingChain: parsed.NFT_PREROUTING_CHAIN,
      postroutingChain: parsed.NFT_POSTROUTING_CHAIN,
      timeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    },
  };
}
