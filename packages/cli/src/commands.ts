import {
  PRIVATE_KEY_ENV,
  TRANSACTION_METHOD_NAMES,
  TrustLedger,
  createSigner,
  loadConfig,
  signDelegation,
  signEnvelope,
  signerFromEnv,
  writeConfig,
  type ReplayReport,
} from "@trustledger/core-runtime";
import type { RegistryName } from "@trustledger/shared-types";

export interface CliContext {
  env: NodeJS.ProcessEnv;
  /** Unix seconds. */
  now?: () => number;
}

const REGISTRIES: readonly RegistryName[] = ["identity", "reputation", "validation", "incident"];

export const HELP = `
trustledger commands:
  trustledger init
  trustledger status
  trustledger keygen
  trustledger methods
  trustledger tx <method> [--params <json>]
  trustledger agent <agentId>
  trustledger feedback <agentId> [--include-revoked]
  trustledger reputation <agentId> [--tag1 <tag>] [--tag2 <tag>]
  trustledger validation <requestId>
  trustledger validations <agentId> [--tag <tag>]
  trustledger incident <incidentId>
  trustledger incidents <agentId>
  trustledger events [--registry <name>] [--agent-id <id>] [--after-seq <seq>] [--limit <n>]
  trustledger journal [--after-seq <seq>] [--limit <n>]
  trustledger audit [--category <name>] [--limit <n>]
  trustledger sign-delegation --agent-id <id> [--deadline <unixSec>]
  trustledger sign-envelope <method> [--params <json>] [--nonce <value>]
  trustledger serve [--port <port>]

Transactions are signed by ${PRIVATE_KEY_ENV}.
`;

/** Runs one non-interactive command and returns the value to print. */
export async function runCommand(argv: string[], context: CliContext): Promise<unknown> {
  const [command, ...args] = argv;
  const now = context.now ?? (() => Math.floor(Date.now() / 1000));

  switch (command) {
    case "init": {
      const config = loadConfig({ env: context.env });
      writeConfig(config);
      return withLedger(context, async (_ledger, replay) => ({
        ok: true,
        command: "init",
        name: config.name,
        configPath: config.configPath,
        dbPath: config.dbPath,
        domain: config.domain,
        replay,
      }));
    }
    case "status":
      return withLedger(context, async (ledger) => ({
        status: ledger.status(),
        schemaVersion: ledger.db.schemaVersion(),
        audit: ledger.db.listAudit(10),
      }));
    case "keygen": {
      const { privateKey, account } = createSigner();
      return { address: account.address, privateKey, env: PRIVATE_KEY_ENV };
    }
    case "methods":
      return TRANSACTION_METHOD_NAMES;
    case "tx": {
      const method = requireArg(args[0], "method");
      const params = parseParams(getOption(args, "--params"));
      const signer = signerFromEnv(context.env);
      return withLedger(context, (ledger) => ledger.submit({ caller: signer.address, method, params }));
    }
    case "agent":
      return withLedger(context, async (ledger) => ledger.identity.getAgent(parseId(args[0], "agentId")));
    case "feedback":
      return withLedger(context, async (ledger) =>
        ledger.reputation.readAllFeedback(parseId(args[0], "agentId"), {
          includeRevoked: args.includes("--include-revoked"),
        }),
      );
    case "reputation":
      return withLedger(context, async (ledger) =>
        ledger.reputation.getSummary(parseId(args[0], "agentId"), {
          tag1: getOption(args, "--tag1"),
          tag2: getOption(args, "--tag2"),
        }),
      );
    case "validation":
      return withLedger(context, async (ledger) => ledger.validation.getRequest(requireArg(args[0], "requestId")));
    case "validations":
      return withLedger(context, async (ledger) => {
        const agentId = parseId(args[0], "agentId");
        return {
          requestIds: ledger.validation.getAgentValidations(agentId),
          summary: ledger.validation.getSummary(agentId, { tag: getOption(args, "--tag") }),
        };
      });
    case "incident":
      return withLedger(context, async (ledger) => ledger.incident.getIncident(parseId(args[0], "incidentId")));
    case "incidents":
      return withLedger(context, async (ledger) => {
        const agentId = parseId(args[0], "agentId");
        return { incidentIds: ledger.incident.getAgentIncidents(agentId), summary: ledger.incident.getSummary(agentId) };
      });
    case "events":
      return withLedger(context, async (ledger) =>
        ledger.db.listEvents({
          registry: parseRegistry(getOption(args, "--registry")),
          agentId: optionalId(getOption(args, "--agent-id"), "--agent-id"),
          type: getOption(args, "--type"),
          afterSeq: optionalId(getOption(args, "--after-seq"), "--after-seq"),
          limit: optionalId(getOption(args, "--limit"), "--limit"),
        }),
      );
    case "journal":
      return withLedger(context, async (ledger) =>
        ledger.db.listTransactions({
          afterSeq: optionalId(getOption(args, "--after-seq"), "--after-seq"),
          limit: optionalId(getOption(args, "--limit"), "--limit"),
        }),
      );
    case "audit":
      return withLedger(context, async (ledger) =>
        ledger.db.listAudit(optionalId(getOption(args, "--limit"), "--limit") ?? 50, getOption(args, "--category")),
      );
    case "sign-delegation": {
      const wallet = signerFromEnv(context.env);
      const agentId = parseId(getOption(args, "--agent-id"), "--agent-id");
      const deadline = optionalId(getOption(args, "--deadline"), "--deadline") ?? now() + 240;
      return withLedger(context, async (ledger) => {
        const message = ledger.identity.delegationMessage(agentId, wallet.address, deadline);
        const proof = await signDelegation(wallet, ledger.config.domain, message);
        return { agentId, ...proof };
      });
    }
    case "sign-envelope": {
      const signer = signerFromEnv(context.env);
      const config = loadConfig({ env: context.env });
      return signEnvelope(signer, config.domain.chainId, {
        method: requireArg(args[0], "method"),
        params: parseParams(getOption(args, "--params")),
        nonce: getOption(args, "--nonce"),
        timestamp: now(),
      });
    }
    case undefined:
    case "help":
    case "--help":
      return HELP;
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

export async function openLedger(env: NodeJS.ProcessEnv): Promise<{ ledger: TrustLedger; replay: ReplayReport }> {
  const ledger = new TrustLedger(loadConfig({ env }));
  try {
    const replay = await ledger.initialize();
    return { ledger, replay };
  } catch (error) {
    ledger.close();
    throw error;
  }
}

async function withLedger<T>(
  context: CliContext,
  fn: (ledger: TrustLedger, replay: ReplayReport) => Promise<T>,
): Promise<T> {
  const { ledger, replay } = await openLedger(context.env);
  try {
    return await fn(ledger, replay);
  } finally {
    ledger.close();
  }
}

export function getOption(args: string[], key: string): string | undefined {
  const idx = args.findIndex((value) => value === key);
  if (idx === -1) {
    return undefined;
  }

  return args[idx + 1];
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`Missing <${name}>`);
  }
  return value;
}

function parseId(value: string | undefined, name: string): number {
  const raw = requireArg(value, name);
  const parsed = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(parsed)) {
    throw new Error(`${name} must be a non-negative integer, got ${raw}`);
  }
  return parsed;
}

function optionalId(value: string | undefined, name: string): number | undefined {
  return value === undefined ? undefined : parseId(value, name);
}

function parseRegistry(value: string | undefined): RegistryName | undefined {
  if (value === undefined) {
    return undefined;
  }
  const registry = REGISTRIES.find((name) => name === value);
  if (!registry) {
    throw new Error(`--registry must be one of ${REGISTRIES.join(", ")}`);
  }
  return registry;
}

function parseParams(raw: string | undefined): unknown {
  if (raw === undefined) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new Error(`--params must be JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}
