import {
  MAX_CATEGORY_LENGTH,
  MAX_URI_LENGTH,
  NULL_EVENT_SINK,
  RegistryError,
  controlsAgent,
  optionalBytes32,
  requireAddress,
  requireAgent,
  requireNonEmpty,
  sameAddress,
  type AgentAuthority,
  type DistributiveOmit,
  type EventSink,
} from "@trustledger/protocol-kernel";
import type {
  HexAddress,
  IncidentEvent,
  IncidentReportInput,
  IncidentResponseInput,
  IncidentStatus,
  IncidentSummary,
  IncidentView,
  ResolutionCode,
  TxContext,
} from "@trustledger/shared-types";
import { createIncidentStore, type IncidentRecord, type IncidentStore } from "./store.js";

/** Codes a reporter may close an incident with. */
export const RESOLUTION_CODES: readonly ResolutionCode[] = [
  "acknowledged",
  "disputed",
  "fixed",
  "not-a-bug",
  "duplicate",
];

export interface IncidentRegistryOptions {
  authority: AgentAuthority;
  store?: IncidentStore;
  events?: EventSink;
}

export class IncidentRegistry {
  private readonly authority: AgentAuthority;
  private readonly store: IncidentStore;
  private readonly events: EventSink;

  constructor(options: IncidentRegistryOptions) {
    this.authority = options.authority;
    this.store = options.store ?? createIncidentStore();
    this.events = options.events ?? NULL_EVENT_SINK;
  }

  reportIncident(ctx: TxContext, input: IncidentReportInput): number {
    const reporter = requireAddress(ctx.caller, "caller");
    requireAgent(this.authority, input.agentId);
    const category = requireNonEmpty(input.category, MAX_CATEGORY_LENGTH, "category");
    const reportURI = requireNonEmpty(input.reportURI, MAX_URI_LENGTH, "reportURI");
    const reportHash = optionalBytes32(input.reportHash, "reportHash");

    const incidentId = this.store.nextIncidentId;
    const record: IncidentRecord = {
      incidentId,
      agentId: input.agentId,
      reporter,
      category,
      reportURI,
      reportHash,
      status: "open",
      reportedAt: ctx.timestamp,
      responder: null,
      responseURI: "",
      responseHash: null,
      respondedAt: null,
      resolution: "none",
      resolver: null,
      resolvedAt: null,
    };

    this.store.incidents.set(incidentId, record);
    this.store.nextIncidentId = incidentId + 1;
    pushIndex(this.store.byAgent, input.agentId, incidentId);
    pushIndex(this.store.byReporter, reporter, incidentId);

    this.emit({
      type: "IncidentReported",
      incidentId,
      agentId: input.agentId,
      reporter,
      category,
      reportURI,
      reportHash,
      status: "open",
      reportedAt: ctx.timestamp,
    });
    return incidentId;
  }

  /** Owner or delegated wallet of the reported agent, while the incident is open. */
  respondToIncident(ctx: TxContext, incidentId: number, input: IncidentResponseInput): void {
    const record = this.requireIncident(incidentId);
    if (!controlsAgent(this.authority, record.agentId, ctx.caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `${ctx.caller} may not respond for agent ${record.agentId}`, {
        incidentId,
        agentId: record.agentId,
      });
    }
    requireStatus(record, "open");
    const responder = requireAddress(ctx.caller, "caller");
    const responseURI = requireNonEmpty(input.responseURI, MAX_URI_LENGTH, "responseURI");
    const responseHash = optionalBytes32(input.responseHash, "responseHash");

    record.status = "responded";
    record.responder = responder;
    record.responseURI = responseURI;
    record.responseHash = responseHash;
    record.respondedAt = ctx.timestamp;

    this.emit({
      type: "IncidentResponded",
      incidentId,
      agentId: record.agentId,
      responder,
      responseURI,
      responseHash,
      status: "responded",
      respondedAt: ctx.timestamp,
    });
  }

  /** Only the original reporter closes an incident, and only after a response. */
  resolveIncident(ctx: TxContext, incidentId: number, resolution: ResolutionCode): void {
    const record = this.requireIncident(incidentId);
    if (!sameAddress(record.reporter, ctx.caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `only the reporter may resolve incident ${incidentId}`, {
        incidentId,
      });
    }
    requireStatus(record, "responded");
    const code = checkResolution(resolution);

    record.status = "resolved";
    record.resolution = code;
    record.resolver = record.reporter;
    record.resolvedAt = ctx.timestamp;

    this.emit({
      type: "IncidentResolved",
      incidentId,
      agentId: record.agentId,
      resolver: record.reporter,
      resolution: code,
      status: "resolved",
      resolvedAt: ctx.timestamp,
    });
  }

  // -------------------------------------------------------------------------
  // Queries

  incidentExists(incidentId: number): boolean {
    return this.store.incidents.has(incidentId);
  }

  getIncident(incidentId: number): IncidentView {
    return { ...this.requireIncident(incidentId) };
  }

  getAgentIncidents(agentId: number): number[] {
    requireAgent(this.authority, agentId);
    return [...(this.store.byAgent.get(agentId) ?? [])];
  }

  getReporterIncidents(reporter: HexAddress): number[] {
    return [...(this.store.byReporter.get(requireAddress(reporter, "reporter")) ?? [])];
  }

  incidentCount(agentId: number): number {
    return this.getAgentIncidents(agentId).length;
  }

  totalIncidents(): number {
    return this.store.nextIncidentId - 1;
  }

  getSummary(agentId: number): IncidentSummary {
    const summary: IncidentSummary = { agentId, total: 0, open: 0, responded: 0, resolved: 0 };
    for (const incidentId of this.getAgentIncidents(agentId)) {
      summary.total++;
      summary[this.requireIncident(incidentId).status]++;
    }
    return summary;
  }

  private requireIncident(incidentId: number): IncidentRecord {
    const record = this.store.incidents.get(incidentId);
    if (!record) {
      throw new RegistryError("INCIDENT_NOT_FOUND", `incident ${incidentId} does not exist`, { incidentId });
    }
    return record;
  }

  private emit(event: DistributiveOmit<IncidentEvent, "registry">): void {
    this.events.emit({ registry: "incident", ...event });
  }
}

function requireStatus(record: IncidentRecord, expected: IncidentStatus): void {
  if (record.status !== expected) {
    throw new RegistryError(
      "INVALID_STATUS",
      `incident ${record.incidentId} is ${record.status}, expected ${expected}`,
      { incidentId: record.incidentId, status: record.status },
    );
  }
}

function checkResolution(value: string): ResolutionCode {
  const match = RESOLUTION_CODES.find((code) => code === value);
  if (!match) {
    throw new RegistryError("INVALID_ARGUMENT", `resolution must be one of ${RESOLUTION_CODES.join(", ")}`, { value });
  }
  return match;
}

function pushIndex<K>(index: Map<K, number[]>, key: K, incidentId: number): void {
  const ids = index.get(key) ?? [];
  ids.push(incidentId);
  index.set(key, ids);
}
