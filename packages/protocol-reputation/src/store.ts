import type { Bytes32, FeedbackResponse, FeedbackScore, HexAddress, Sentiment } from "@trustledger/shared-types";

export interface FeedbackRecord {
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

export interface ReputationStore {
  /** agentId -> feedback in submission order; position is the feedback index */
  feedback: Map<number, FeedbackRecord[]>;
  /** agentId -> distinct authors in first-submission order */
  authors: Map<number, HexAddress[]>;
}

export function createReputationStore(): ReputationStore {
  return {
    feedback: new Map(),
    authors: new Map(),
  };
}
