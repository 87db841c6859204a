export type HexAddress = `0x${string}`;
export type HexBytes = `0x${string}`;
export type Bytes32 = `0x${string}`;

/**
 * Execution context of one mutating call: who is calling, and the commit time
 * (unix seconds) the journal records for the transaction.
 */
export interface TxContext {
  caller: HexAddress;
  timestamp: number;
}

/**
 * The execution-environment identifier. Folded into validation request ids and
 * into the delegation signing domain so values from one deployment never
 * collide with, or replay into, another.
 */
export interface ExecutionDomain {
  chainId: number;
  identityRegistry: HexAddress;
  reputationRegistry: HexAddress;
  validationRegistry: HexAddress;
  incidentRegistry: HexAddress;
}

export interface TrustLedgerConfig {
  name: string;
  homeDir: string;
  dataDir: string;
  dbPath: string;
  configPath: string;
  domain: ExecutionDomain;
  localApiPort: number;
  auditRejections: boolean;
  debug: boolean;
}

// ---------------------------------------------------------------------------
// Identity

export interface MetadataEntry {
  key: string;
  value: HexBytes;
}

export interface AgentView {
  agentId: number;
  owner: HexAddress;
  uri: string;
  uriHash: Bytes32 | null;
  metadata: Record<string, HexBytes>;
  agentWallet: HexAddress | null;
  approved: HexAddress | null;
  active: boolean;
  walletNonce: number;
  createdAt: number;
  updatedAt: number;
}

export interface DelegationProof {
  wallet: HexAddress;
  deadline: number;
  signature: HexBytes;
}

export interface DelegationMessage {
  agentId: number;
  wallet: HexAddress;
  owner: HexAddress;
  nonce: number;
  deadline: number;
}

// ---------------------------------------------------------------------------
// Reputation

export type Sentiment = "positive" | "neutral" | "negative";

export interface FeedbackScore {
  value: bigint;
  decimals: number;
}

export interface FeedbackInput {
  text: string;
  sentiment: Sentiment;
  score?: FeedbackScore;
  tag1?: string;
  tag2?: string;
  endpoint?: string;
  feedbackURI?: string;
  feedbackHash?: Bytes32;
}

export interface ResponseInput {
  text: string;
  responseURI?: string;
  responseHash?: Bytes32;
}

export interface FeedbackResponse {
  responder: HexAddress;
  text: string;
  responseURI: string;
  responseHash: Bytes32 | null;
  createdAt: number;
}

export interface FeedbackView {
  agentId: number;
  index: number;
  author: HexAddress;
  text: string;
  sentiment: Sentiment;
  score: FeedbackScore | null;
  tag1: string;
  tag2: string;
  endpoint: string;
  feedbackURI: string;
  feedbackHash: Bytes32 | null;
  createdAt: number;
  revoked: boolean;
  revokedAt: number | null;
  responses: FeedbackResponse[];
}

export interface FeedbackFilter {
  authors?: HexAddress[];
  tag1?: string;
  tag2?: string;
}

export interface ReputationSummary {
  agentId: number;
  total: number;
  active: number;
  revoked: number;
  positive: number;
  neutral: number;
  negative: number;
  scoreCount: number;
  /** Sum of active scores, normalised to `scoreDecimals`. */
  scoreSum: bigint;
  scoreDecimals: number;
}

// ---------------------------------------------------------------------------
// Validation

export type ValidationStatus = "pending" | "completed" | "rejected" | "cancelled";

export interface ValidationRequestInput {
  validator: HexAddress;
  agentId: number;
  requestURI: string;
  contentHash?: Bytes32;
}

export interface ValidationOutcomeInput {
  response?: number;
  responseURI?: string;
  responseHash?: Bytes32;
  tag?: string;
}

export interface ValidationRequestView {
  requestId: Bytes32;
  requester: HexAddress;
  validator: HexAddress;
  agentId: number;
  contentHash: Bytes32;
  requestURI: string;
  nonce: number;
  status: ValidationStatus;
  response: number | null;
  responseDefaulted: boolean;
  responseURI: string;
  responseHash: Bytes32 | null;
  tag: string;
  createdAt: number;
  completedAt: number | null;
}

export interface ValidationStatusView {
  requestId: Bytes32;
  status: ValidationStatus;
  validator: HexAddress;
  agentId: number;
  response: number | null;
  tag: string;
  lastUpdate: number;
}

export interface ValidationFilter {
  validators?: HexAddress[];
  tag?: string;
}

export interface ValidationSummary {
  agentId: number;
  total: number;
  pending: number;
  completed: number;
  rejected: number;
  cancelled: number;
  averageResponse: number | null;
}

// ---------------------------------------------------------------------------
// Incident

export type IncidentStatus = "open" | "responded" | "resolved";

export type ResolutionCode =
  | "none"
  | "acknowledged"
  | "disputed"
  | "fixed"
  | "not-a-bug"
  | "duplicate";

export interface IncidentReportInput {
  agentId: number;
  category: string;
  reportURI: string;
  reportHash?: Bytes32;
}

export interface IncidentResponseInput {
  responseURI: string;
  responseHash?: Bytes32;
}

export interface IncidentView {
  incidentId: number;
  agentId: number;
  reporter: HexAddress;
  category: string;
  reportURI: string;
  reportHash: Bytes32 | null;
  status: IncidentStatus;
  reportedAt: number;
  responder: HexAddress | null;
  responseURI: string;
  responseHash: Bytes32 | null;
  respondedAt: number | null;
  resolution: ResolutionCode;
  resolver: HexAddress | null;
  resolvedAt: number | null;
}

export interface IncidentSummary {
  agentId: number;
  total: number;
  open: number;
  responded: number;
  resolved: number;
}

// ---------------------------------------------------------------------------
// Notifications

export type IdentityEvent =
  | { registry: "identity"; type: "Transfer"; from: HexAddress; to: HexAddress; agentId: number }
  | { registry: "identity"; type: "Registered"; agentId: number; owner: HexAddress; uri: string }
  | { registry: "identity"; type: "UriUpdated"; agentId: number; uri: string; uriHash: Bytes32 | null; updatedBy: HexAddress }
  | { registry: "identity"; type: "MetadataSet"; agentId: number; key: string; value: HexBytes; updatedBy: HexAddress }
  | { registry: "identity"; type: "AgentWalletSet"; agentId: number; wallet: HexAddress; setBy: HexAddress; nonce: number }
  | {
    registry: "identity";
    type: "AgentWalletCleared";
    agentId: number;
    previousWallet: HexAddress;
    reason: "unset" | "transfer";
  }
  | { registry: "identity"; type: "AgentDeactivated"; agentId: number; owner: HexAddress }
  | { registry: "identity"; type: "AgentReactivated"; agentId: number; owner: HexAddress }
  | { registry: "identity"; type: "Approval"; owner: HexAddress; approved: HexAddress | null; agentId: number }
  | { registry: "identity"; type: "ApprovalForAll"; owner: HexAddress; operator: HexAddress; approved: boolean };

export type ReputationEvent =
  | {
    registry: "reputation";
    type: "NewFeedback";
    agentId: number;
    index: number;
    author: HexAddress;
    text: string;
    sentiment: Sentiment;
    score: FeedbackScore | null;
    tag1: string;
    tag2: string;
    endpoint: string;
    feedbackURI: string;
    feedbackHash: Bytes32 | null;
    createdAt: number;
  }
  | { registry: "reputation"; type: "FeedbackRevoked"; agentId: number; index: number; author: HexAddress; revokedAt: number }
  | {
    registry: "reputation";
    type: "ResponseAppended";
    agentId: number;
    index: number;
    responseIndex: number;
    responder: HexAddress;
    text: string;
    responseURI: string;
    responseHash: Bytes32 | null;
    createdAt: number;
  };

export type ValidationEvent =
  | {
    registry: "validation";
    type: "ValidationRequested";
    requestId: Bytes32;
    requester: HexAddress;
    validator: HexAddress;
    agentId: number;
    requestURI: string;
    contentHash: Bytes32;
    nonce: number;
    createdAt: number;
  }
  | {
    registry: "validation";
    type: "ValidationCompleted" | "ValidationRejected";
    requestId: Bytes32;
    validator: HexAddress;
    agentId: number;
    status: "completed" | "rejected";
    response: number;
    responseDefaulted: boolean;
    responseURI: string;
    responseHash: Bytes32 | null;
    tag: string;
    completedAt: number;
  }
  | {
    registry: "validation";
    type: "ValidationCancelled";
    requestId: Bytes32;
    requester: HexAddress;
    agentId: number;
    status: "cancelled";
    completedAt: number;
  };

export type IncidentEvent =
  | {
    registry: "incident";
    type: "IncidentReported";
    incidentId: number;
    agentId: number;
    reporter: HexAddress;
    category: string;
    reportURI: string;
    reportHash: Bytes32 | null;
    status: "open";
    reportedAt: number;
  }
  | {
    registry: "incident";
    type: "IncidentResponded";
    incidentId: number;
    agentId: number;
    responder: HexAddress;
    responseURI: string;
    responseHash: Bytes32 | null;
    status: "responded";
    respondedAt: number;
  }
  | {
    registry: "incident";
    type: "IncidentResolved";
    incidentId: number;
    agentId: number;
    resolver: HexAddress;
    resolution: ResolutionCode;
    status: "resolved";
    resolvedAt: number;
  };

export type LedgerEvent = IdentityEvent | ReputationEvent | ValidationEvent | IncidentEvent;

export type RegistryName = LedgerEvent["registry"];

// ---------------------------------------------------------------------------
// Journal

export interface AuditEntry {
  id: string;
  timestamp: string;
  category: string;
  action: string;
  details: string | null;
}

export interface JournaledTransaction {
  seq: number;
  id: string;
  timestamp: number;
  caller: HexAddress;
  method: string;
  params: unknown;
  events: string;
  committedAt: string;
}

export interface JournaledEvent {
  id: string;
  txSeq: number;
  logIndex: number;
  registry: RegistryName;
  type: string;
  agentId: number | null;
  timestamp: number;
  payload: Record<string, unknown>;
}
