import { z } from "zod";
import { RegistryError } from "@trustledger/protocol-kernel";
import type { IdentityRegistry } from "@trustledger/protocol-identity";
import type { IncidentRegistry } from "@trustledger/protocol-incident";
import type { ReputationRegistry } from "@trustledger/protocol-reputation";
import type { ValidationRegistry } from "@trustledger/protocol-validation";
import type { TxContext } from "@trustledger/shared-types";

export interface Registries {
  identity: IdentityRegistry;
  reputation: ReputationRegistry;
  validation: ValidationRegistry;
  incident: IncidentRegistry;
}

/** A ledger method with its payload schema bound in. */
export interface TransactionMethod {
  readonly name: string;
  run(registries: Registries, ctx: TxContext, params: unknown): Promise<unknown>;
}

// Format checks stay shallow here: the registries own address, hash and
// length validation and report it with their own error codes.
const hex = z.string().refine((value): value is `0x${string}` => value.startsWith("0x"), "must be 0x-prefixed hex");
const id = z.number().int().nonnegative();
const text = z.string();

const score = z
  .object({
    value: z.union([z.string().regex(/^-?\d+$/), z.number().int(), z.bigint()]).transform((value) => BigInt(value)),
    decimals: z.number().int(),
  })
  .strict();

const agentOnly = z.object({ agentId: id }).strict();

const decision = z
  .object({
    requestId: hex,
    response: z.number().optional(),
    responseURI: text.optional(),
    responseHash: hex.optional(),
    tag: text.optional(),
  })
  .strict();

function defineMethod<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  apply: (registries: Registries, ctx: TxContext, params: z.output<S>) => unknown,
): TransactionMethod {
  return {
    name,
    async run(registries, ctx, raw) {
      const parsed = schema.safeParse(raw ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue?.path.join(".") || "params";
        throw new RegistryError("INVALID_ARGUMENT", `${name}: ${field} ${issue?.message ?? "is invalid"}`, {
          method: name,
          field,
        });
      }
      const output: z.output<S> = parsed.data;
      return apply(registries, ctx, output);
    },
  };
}

const METHODS: TransactionMethod[] = [
  // Identity
  defineMethod(
    "identity.register",
    z
      .object({
        uri: text.optional(),
        metadata: z.array(z.object({ key: text, value: hex }).strict()).optional(),
      })
      .strict(),
    (r, ctx, p) => r.identity.register(ctx, p.uri ?? "", p.metadata ?? []),
  ),
  defineMethod(
    "identity.setAgentURI",
    z.object({ agentId: id, uri: text, uriHash: hex.optional() }).strict(),
    (r, ctx, p) => r.identity.setAgentURI(ctx, p.agentId, p.uri, p.uriHash),
  ),
  defineMethod(
    "identity.setMetadata",
    z.object({ agentId: id, key: text, value: hex }).strict(),
    (r, ctx, p) => r.identity.setMetadata(ctx, p.agentId, p.key, p.value),
  ),
  defineMethod(
    "identity.setAgentWallet",
    z.object({ agentId: id, wallet: hex, deadline: id, signature: hex }).strict(),
    (r, ctx, p) =>
      r.identity.setAgentWallet(ctx, p.agentId, { wallet: p.wallet, deadline: p.deadline, signature: p.signature }),
  ),
  defineMethod("identity.unsetAgentWallet", agentOnly, (r, ctx, p) => r.identity.unsetAgentWallet(ctx, p.agentId)),
  defineMethod("identity.deactivate", agentOnly, (r, ctx, p) => r.identity.deactivate(ctx, p.agentId)),
  defineMethod("identity.reactivate", agentOnly, (r, ctx, p) => r.identity.reactivate(ctx, p.agentId)),
  defineMethod(
    "identity.approve",
    z.object({ agentId: id, approved: hex.nullable() }).strict(),
    (r, ctx, p) => r.identity.approve(ctx, p.approved, p.agentId),
  ),
  defineMethod(
    "identity.setApprovalForAll",
    z.object({ operator: hex, approved: z.boolean() }).strict(),
    (r, ctx, p) => r.identity.setApprovalForAll(ctx, p.operator, p.approved),
  ),
  defineMethod(
    "identity.transferFrom",
    z.object({ from: hex, to: hex, agentId: id }).strict(),
    (r, ctx, p) => r.identity.transferFrom(ctx, p.from, p.to, p.agentId),
  ),
  defineMethod(
    "identity.safeTransferFrom",
    z.object({ from: hex, to: hex, agentId: id, data: hex.optional() }).strict(),
    (r, ctx, p) => r.identity.safeTransferFrom(ctx, p.from, p.to, p.agentId, p.data),
  ),

  // Reputation
  defineMethod(
    "reputation.giveFeedback",
    z
      .object({
        agentId: id,
        text,
        sentiment: z.enum(["positive", "neutral", "negative"]),
        score: score.optional(),
        tag1: text.optional(),
        tag2: text.optional(),
        endpoint: text.optional(),
        feedbackURI: text.optional(),
        feedbackHash: hex.optional(),
      })
      .strict(),
    (r, ctx, { agentId, ...input }) => r.reputation.giveFeedback(ctx, agentId, input),
  ),
  defineMethod(
    "reputation.revokeFeedback",
    z.object({ agentId: id, index: id }).strict(),
    (r, ctx, p) => r.reputation.revokeFeedback(ctx, p.agentId, p.index),
  ),
  defineMethod(
    "reputation.appendResponse",
    z
      .object({ agentId: id, index: id, text, responseURI: text.optional(), responseHash: hex.optional() })
      .strict(),
    (r, ctx, { agentId, index, ...input }) => r.reputation.appendResponse(ctx, agentId, index, input),
  ),

  // Validation
  defineMethod(
    "validation.request",
    z.object({ validator: hex, agentId: id, requestURI: text, contentHash: hex.optional() }).strict(),
    (r, ctx, p) => r.validation.requestValidation(ctx, p),
  ),
  defineMethod(
    "validation.complete",
    decision,
    (r, ctx, { requestId, ...outcome }) => r.validation.completeValidation(ctx, requestId, outcome),
  ),
  defineMethod(
    "validation.reject",
    decision,
    (r, ctx, { requestId, ...outcome }) => r.validation.rejectValidation(ctx, requestId, outcome),
  ),
  defineMethod(
    "validation.cancel",
    z.object({ requestId: hex }).strict(),
    (r, ctx, p) => r.validation.cancelValidation(ctx, p.requestId),
  ),

  // Incident
  defineMethod(
    "incident.report",
    z.object({ agentId: id, category: text, reportURI: text, reportHash: hex.optional() }).strict(),
    (r, ctx, p) => r.incident.reportIncident(ctx, p),
  ),
  defineMethod(
    "incident.respond",
    z.object({ incidentId: id, responseURI: text, responseHash: hex.optional() }).strict(),
    (r, ctx, { incidentId, ...input }) => r.incident.respondToIncident(ctx, incidentId, input),
  ),
  defineMethod(
    "incident.resolve",
    z
      .object({
        incidentId: id,
        resolution: z.enum(["none", "acknowledged", "disputed", "fixed", "not-a-bug", "duplicate"]),
      })
      .strict(),
    (r, ctx, p) => r.incident.resolveIncident(ctx, p.incidentId, p.resolution),
  ),
];

const METHODS_BY_NAME = new Map(METHODS.map((method) => [method.name, method]));

export const TRANSACTION_METHOD_NAMES: readonly string[] = METHODS.map((method) => method.name);

export function lookupMethod(name: string): TransactionMethod {
  const method = METHODS_BY_NAME.get(name);
  if (!method) {
    throw new RegistryError("INVALID_ARGUMENT", `unknown method ${name}`, { method: name });
  }
  return method;
}
