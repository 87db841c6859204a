import express from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import {
  envelopeSchema,
  errorMessage,
  stringifyJson,
  verifyEnvelope,
  type TrustLedger,
} from "@trustledger/core-runtime";
import { isRecord } from "@trustledger/state";
import { isRegistryError, type RegistryErrorKind } from "@trustledger/protocol-kernel";
import type { HexAddress } from "@trustledger/shared-types";

export interface LocalAppOptions {
  ledger: TrustLedger;
  /** Unix seconds; used for the envelope skew window. */
  clock?: () => number;
}

const STATUS_BY_KIND: Record<RegistryErrorKind, number> = {
  input: 400,
  reference: 404,
  authorization: 403,
  state: 409,
  integrity: 500,
};

const agentParams = z.object({ agentId: z.coerce.number().int().nonnegative() });
const incidentParams = z.object({ incidentId: z.coerce.number().int().nonnegative() });
const address = z.string().refine((value): value is HexAddress => /^0x[0-9a-fA-F]{40}$/.test(value), "must be an address");
const list = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (value === undefined ? undefined : [value].flat().flatMap((entry) => entry.split(","))))
  .pipe(z.array(address).optional());

const feedbackQuery = z.object({
  authors: list,
  tag1: z.string().optional(),
  tag2: z.string().optional(),
  includeRevoked: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});
const validationQuery = z.object({ validators: list, tag: z.string().optional() });
const eventQuery = z.object({
  registry: z.enum(["identity", "reputation", "validation", "incident"]).optional(),
  agentId: z.coerce.number().int().nonnegative().optional(),
  type: z.string().optional(),
  afterSeq: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export function statusForError(error: unknown): number {
  if (isRegistryError(error)) {
    return STATUS_BY_KIND[error.kind];
  }
  if (error instanceof z.ZodError) {
    return 400;
  }
  return 500;
}

function sendJson(res: Response, status: number, body: unknown): void {
  res.status(status).type("application/json").send(stringifyJson(body));
}

function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  sendJson(res, status, {
    error: error instanceof z.ZodError ? error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") : errorMessage(error),
    code: isRegistryError(error) ? error.code : undefined,
  });
}

/** Wraps a read handler so thrown errors become JSON error responses. */
function read(handler: (req: Request) => unknown): express.RequestHandler {
  return (req, res) => {
    try {
      sendJson(res, 200, handler(req));
    } catch (error) {
      sendError(res, error);
    }
  };
}

export function createLocalApp(options: LocalAppOptions): express.Express {
  const { ledger } = options;
  const clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
  const app = express();
  app.use(express.json({ limit: "256kb" }));
  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    if (req.method === "OPTIONS") {
      res.status(204).send("");
      return;
    }
    next();
  });

  app.get("/health", read(() => ({ ok: true, status: ledger.status() })));

  app.get(
    "/v1/agents/:agentId",
    read((req) => ledger.identity.getAgent(agentParams.parse(req.params).agentId)),
  );

  app.get(
    "/v1/agents/:agentId/feedback",
    read((req) => ledger.reputation.readAllFeedback(agentParams.parse(req.params).agentId, feedbackQuery.parse(req.query))),
  );

  app.get(
    "/v1/agents/:agentId/reputation",
    read((req) => {
      const { includeRevoked: _ignored, ...filter } = feedbackQuery.parse(req.query);
      return ledger.reputation.getSummary(agentParams.parse(req.params).agentId, filter);
    }),
  );

  app.get(
    "/v1/agents/:agentId/validations",
    read((req) => {
      const { agentId } = agentParams.parse(req.params);
      return {
        requestIds: ledger.validation.getAgentValidations(agentId),
        summary: ledger.validation.getSummary(agentId, validationQuery.parse(req.query)),
      };
    }),
  );

  app.get(
    "/v1/validations/:requestId",
    read((req) => ledger.validation.getRequest(String(req.params.requestId))),
  );

  app.get(
    "/v1/agents/:agentId/incidents",
    read((req) => {
      const { agentId } = agentParams.parse(req.params);
      return {
        incidentIds: ledger.incident.getAgentIncidents(agentId),
        summary: ledger.incident.getSummary(agentId),
      };
    }),
  );

  app.get(
    "/v1/incidents/:incidentId",
    read((req) => ledger.incident.getIncident(incidentParams.parse(req.params).incidentId)),
  );

  app.get("/v1/events", read((req) => ledger.db.listEvents(eventQuery.parse(req.query))));

  app.post("/v1/transactions", async (req, res) => {
    const parsed = envelopeSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, parsed.error);
      return;
    }

    try {
      const envelope = parsed.data;
      const nowSec = clock();
      const nowIso = new Date(nowSec * 1000).toISOString();
      const check = await verifyEnvelope(envelope, ledger.config.domain.chainId, nowSec);
      if (!check.ok) {
        sendJson(res, 401, { error: check.error });
        return;
      }

      ledger.db.cleanupReplayFingerprints(nowIso);
      if (ledger.db.hasReplayFingerprint(check.fingerprint, nowIso)) {
        sendJson(res, 409, { error: "Envelope nonce already used" });
        return;
      }
      ledger.db.recordReplayFingerprint(check.fingerprint, check.expiresAt);

      const receipt = await ledger.submit({ caller: check.caller, method: envelope.method, params: envelope.params });
      sendJson(res, 200, receipt);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.use((_req, res) => {
    sendJson(res, 404, { error: "Not found" });
  });

  // body-parser failures carry their own status
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = isRecord(error) && typeof error.status === "number" ? error.status : statusForError(error);
    sendJson(res, status, { error: errorMessage(error) });
  });

  return app;
}
