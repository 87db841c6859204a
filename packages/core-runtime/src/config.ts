import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { isAddress, getAddress } from "viem";
import { sameAddress, ZERO_ADDRESS } from "@trustledger/protocol-kernel";
import type { ExecutionDomain, HexAddress, TrustLedgerConfig } from "@trustledger/shared-types";

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/** Local development domain used when nothing else is configured. */
export const DEFAULT_DOMAIN: ExecutionDomain = {
  chainId: 31337,
  identityRegistry: "0x0000000000000000000000000000000000008001",
  reputationRegistry: "0x0000000000000000000000000000000000008002",
  validationRegistry: "0x0000000000000000000000000000000000008003",
  incidentRegistry: "0x0000000000000000000000000000000000008004",
};

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "must be a 20-byte hex address")
  .transform((value): HexAddress => getAddress(value));

const domainFileSchema = z
  .object({
    chainId: z.number().int(),
    identityRegistry: addressSchema,
    reputationRegistry: addressSchema,
    validationRegistry: addressSchema,
    incidentRegistry: addressSchema,
  })
  .partial();

const configFileSchema = z
  .object({
    name: z.string(),
    homeDir: z.string(),
    dataDir: z.string(),
    dbPath: z.string(),
    configPath: z.string(),
    domain: domainFileSchema,
    localApiPort: z.number().int(),
    auditRejections: z.boolean(),
    debug: z.boolean(),
  })
  .partial();

export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): TrustLedgerConfig {
  const homeDir = env.TRUSTLEDGER_HOME ?? path.join(os.homedir(), ".trustledger");
  const dataDir = path.join(homeDir, "data");

  return {
    name: env.TRUSTLEDGER_NAME ?? "trustledger-local",
    homeDir,
    dataDir,
    dbPath: path.join(dataDir, "ledger.db"),
    configPath: path.join(homeDir, "config.json"),
    domain: {
      chainId: Number(env.TRUSTLEDGER_CHAIN_ID ?? DEFAULT_DOMAIN.chainId),
      identityRegistry: envAddress(env.TRUSTLEDGER_IDENTITY_REGISTRY, DEFAULT_DOMAIN.identityRegistry),
      reputationRegistry: envAddress(env.TRUSTLEDGER_REPUTATION_REGISTRY, DEFAULT_DOMAIN.reputationRegistry),
      validationRegistry: envAddress(env.TRUSTLEDGER_VALIDATION_REGISTRY, DEFAULT_DOMAIN.validationRegistry),
      incidentRegistry: envAddress(env.TRUSTLEDGER_INCIDENT_REGISTRY, DEFAULT_DOMAIN.incidentRegistry),
    },
    localApiPort: Number(env.TRUSTLEDGER_API_PORT ?? 4123),
    auditRejections: (env.TRUSTLEDGER_AUDIT_REJECTIONS ?? "true") !== "false",
    debug: (env.TRUSTLEDGER_DEBUG ?? "false") === "true",
  };
}

export function loadConfig(options: LoadConfigOptions = {}): TrustLedgerConfig {
  const env = options.env ?? process.env;
  const base = createDefaultConfig(env);

  const configPath = options.configPath ?? base.configPath;
  let diskOverrides: z.infer<typeof configFileSchema> = {};

  if (fs.existsSync(configPath)) {
    const parsed = configFileSchema.safeParse(JSON.parse(fs.readFileSync(configPath, "utf-8")));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Ledger config error: ${issue?.path.join(".") ?? "config"} ${issue?.message ?? "is invalid"}`);
    }
    diskOverrides = parsed.data;
  }

  const merged: TrustLedgerConfig = {
    ...base,
    ...diskOverrides,
    domain: {
      ...base.domain,
      ...(diskOverrides.domain ?? {}),
    },
  };

  validateConfig(merged);
  return merged;
}

export function ensureRuntimeDirectories(config: TrustLedgerConfig): void {
  fs.mkdirSync(config.homeDir, { recursive: true, mode: 0o700 });
  fs.mkdirSync(config.dataDir, { recursive: true, mode: 0o700 });
}

export function writeConfig(config: TrustLedgerConfig, configPath = config.configPath): void {
  ensureRuntimeDirectories(config);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function validateConfig(config: TrustLedgerConfig): void {
  if (!config.name.trim()) {
    throw new Error("Ledger config error: name is required");
  }

  const { domain } = config;
  if (!Number.isSafeInteger(domain.chainId) || domain.chainId <= 0) {
    throw new Error("Ledger config error: domain.chainId must be a positive integer");
  }

  const registries: Array<[string, HexAddress]> = [
    ["identityRegistry", domain.identityRegistry],
    ["reputationRegistry", domain.reputationRegistry],
    ["validationRegistry", domain.validationRegistry],
    ["incidentRegistry", domain.incidentRegistry],
  ];
  for (const [field, address] of registries) {
    if (!isAddress(address, { strict: false }) || sameAddress(address, ZERO_ADDRESS)) {
      throw new Error(`Ledger config error: domain.${field} must be a non-zero 20-byte hex address`);
    }
  }
  const distinct = new Set(registries.map(([, address]) => address.toLowerCase()));
  if (distinct.size !== registries.length) {
    throw new Error("Ledger config error: registry addresses must be distinct");
  }

  if (!Number.isInteger(config.localApiPort) || config.localApiPort < 1 || config.localApiPort > 65_535) {
    throw new Error("Ledger config error: localApiPort must be between 1 and 65535");
  }
}

function envAddress(value: string | undefined, fallback: HexAddress): HexAddress {
  if (value === undefined) {
    return fallback;
  }
  if (!isAddress(value, { strict: false })) {
    throw new Error(`Ledger config error: ${value} is not a 20-byte hex address`);
  }
  return getAddress(value);
}
