import type { HexAddress, IncidentView } from "@trustledger/shared-types";

export type IncidentRecord = IncidentView;

export interface IncidentStore {
  incidents: Map<number, IncidentRecord>;
  /** Next id to assign; ids start at 1. */
  nextIncidentId: number;
  byAgent: Map<number, number[]>;
  byReporter: Map<HexAddress, number[]>;
}

export function createIncidentStore(): IncidentStore {
  return {
    incidents: new Map(),
    nextIncidentId: 1,
    byAgent: new Map(),
    byReporter: new Map(),
  };
}
