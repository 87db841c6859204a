import {
  MAX_ENDPOINT_LENGTH,
  MAX_INT128,
  MAX_RESPONSES_PER_FEEDBACK,
  MAX_SCORE_DECIMALS,
  MAX_TAG_LENGTH,
  MAX_TEXT_LENGTH,
  MAX_URI_LENGTH,
  MIN_INT128,
  NULL_EVENT_SINK,
  RegistryError,
  SCORE_SUMMARY_DECIMALS,
  controlsAgent,
  optionalBytes32,
  requireAddress,
  requireAgent,
  requireMaxLength,
  sameAddress,
  type AgentAuthority,
  type DistributiveOmit,
  type EventSink,
} from "@trustledger/protocol-kernel";
import type {
  FeedbackFilter,
  FeedbackInput,
  FeedbackResponse,
  FeedbackScore,
  FeedbackView,
  HexAddress,
  ReputationEvent,
  ReputationSummary,
  ResponseInput,
  Sentiment,
  TxContext,
} from "@trustledger/shared-types";
import { createReputationStore, type FeedbackRecord, type ReputationStore } from "./store.js";

const SENTIMENTS: readonly Sentiment[] = ["positive", "neutral", "negative"];

export interface ReputationRegistryOptions {
  authority: AgentAuthority;
  store?: ReputationStore;
  events?: EventSink;
}

export interface FeedbackQuery extends FeedbackFilter {
  includeRevoked?: boolean;
}

export class ReputationRegistry {
  private readonly authority: AgentAuthority;
  private readonly store: ReputationStore;
  private readonly events: EventSink;

  constructor(options: ReputationRegistryOptions) {
    this.authority = options.authority;
    this.store = options.store ?? createReputationStore();
    this.events = options.events ?? NULL_EVENT_SINK;
  }

  giveFeedback(ctx: TxContext, agentId: number, input: FeedbackInput): number;
  giveFeedback(ctx: TxContext, agentId: number, text: string, sentiment: Sentiment): number;
  giveFeedback(ctx: TxContext, agentId: number, inputOrText: FeedbackInput | string, sentiment?: Sentiment): number {
    const input: FeedbackInput =
      typeof inputOrText === "string" ? { text: inputOrText, sentiment: sentiment ?? "neutral" } : inputOrText;

    requireAgent(this.authority, agentId);
    const author = requireAddress(ctx.caller, "caller");
    if (controlsAgent(this.authority, agentId, author)) {
      throw new RegistryError("SELF_FEEDBACK", `${author} controls agent ${agentId}`, { agentId, author });
    }

    const record: FeedbackRecord = {
      index: this.feedbackCount(agentId),
      author,
      text: requireMaxLength(input.text, MAX_TEXT_LENGTH, "text"),
      sentiment: checkSentiment(input.sentiment),
      score: input.score === undefined ? null : checkScore(input.score),
      tag1: requireMaxLength(input.tag1 ?? "", MAX_TAG_LENGTH, "tag1"),
      tag2: requireMaxLength(input.tag2 ?? "", MAX_TAG_LENGTH, "tag2"),
      endpoint: requireMaxLength(input.endpoint ?? "", MAX_ENDPOINT_LENGTH, "endpoint"),
      feedbackURI: requireMaxLength(input.feedbackURI ?? "", MAX_URI_LENGTH, "feedbackURI"),
      feedbackHash: optionalBytes32(input.feedbackHash, "feedbackHash"),
      createdAt: ctx.timestamp,
      revoked: false,
      revokedAt: null,
      responses: [],
    };

    const list = this.store.feedback.get(agentId) ?? [];
    list.push(record);
    this.store.feedback.set(agentId, list);

    const authors = this.store.authors.get(agentId) ?? [];
    if (!authors.includes(author)) {
      authors.push(author);
    }
    this.store.authors.set(agentId, authors);

    this.emit({
      type: "NewFeedback",
      agentId,
      index: record.index,
      author,
      text: record.text,
      sentiment: record.sentiment,
      score: record.score,
      tag1: record.tag1,
      tag2: record.tag2,
      endpoint: record.endpoint,
      feedbackURI: record.feedbackURI,
      feedbackHash: record.feedbackHash,
      createdAt: record.createdAt,
    });
    return record.index;
  }

  revokeFeedback(ctx: TxContext, agentId: number, index: number): void {
    const record = this.requireFeedback(agentId, index);
    if (!sameAddress(record.author, ctx.caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `only the author may revoke feedback ${index}`, { agentId, index });
    }
    if (record.revoked) {
      throw new RegistryError("ALREADY_REVOKED", `feedback ${index} of agent ${agentId} is already revoked`, {
        agentId,
        index,
      });
    }

    record.revoked = true;
    record.revokedAt = ctx.timestamp;
    this.emit({ type: "FeedbackRevoked", agentId, index, author: record.author, revokedAt: ctx.timestamp });
  }

  appendResponse(ctx: TxContext, agentId: number, index: number, input: ResponseInput): number {
    const record = this.requireFeedback(agentId, index);
    if (!controlsAgent(this.authority, agentId, ctx.caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `${ctx.caller} may not respond for agent ${agentId}`, { agentId });
    }
    if (record.revoked) {
      throw new RegistryError("FEEDBACK_REVOKED", `feedback ${index} of agent ${agentId} was revoked`, {
        agentId,
        index,
      });
    }
    if (record.responses.length >= MAX_RESPONSES_PER_FEEDBACK) {
      throw new RegistryError("THREAD_FULL", `feedback ${index} already has ${MAX_RESPONSES_PER_FEEDBACK} responses`, {
        agentId,
        index,
      });
    }

    const response: FeedbackResponse = {
      responder: requireAddress(ctx.caller, "caller"),
      text: requireMaxLength(input.text, MAX_TEXT_LENGTH, "text"),
      responseURI: requireMaxLength(input.responseURI ?? "", MAX_URI_LENGTH, "responseURI"),
      responseHash: optionalBytes32(input.responseHash, "responseHash"),
      createdAt: ctx.timestamp,
    };
    record.responses.push(response);

    const responseIndex = record.responses.length - 1;
    this.emit({ type: "ResponseAppended", agentId, index, responseIndex, ...response });
    return responseIndex;
  }

  // -------------------------------------------------------------------------
  // Queries

  feedbackCount(agentId: number): number {
    requireAgent(this.authority, agentId);
    return this.store.feedback.get(agentId)?.length ?? 0;
  }

  getFeedback(agentId: number, index: number): FeedbackView {
    return toView(agentId, this.requireFeedback(agentId, index));
  }

  getResponses(agentId: number, index: number): FeedbackResponse[] {
    return this.requireFeedback(agentId, index).responses.map((response) => ({ ...response }));
  }

  getResponseCount(agentId: number, index: number): number {
    return this.requireFeedback(agentId, index).responses.length;
  }

  getAuthors(agentId: number): HexAddress[] {
    requireAgent(this.authority, agentId);
    return [...(this.store.authors.get(agentId) ?? [])];
  }

  findFeedbackIndices(agentId: number, query: FeedbackQuery = {}): number[] {
    return this.matching(agentId, query)
      .filter((record) => query.includeRevoked || !record.revoked)
      .map((record) => record.index);
  }

  readAllFeedback(agentId: number, query: FeedbackQuery = {}): FeedbackView[] {
    return this.matching(agentId, query)
      .filter((record) => query.includeRevoked || !record.revoked)
      .map((record) => toView(agentId, record));
  }

  /**
   * Sentiment tallies and score totals cover active feedback only; `revoked`
   * reports how many matching entries were withdrawn.
   */
  getSummary(agentId: number, filter: FeedbackFilter = {}): ReputationSummary {
    const summary: ReputationSummary = {
      agentId,
      total: 0,
      active: 0,
      revoked: 0,
      positive: 0,
      neutral: 0,
      negative: 0,
      scoreCount: 0,
      scoreSum: 0n,
      scoreDecimals: SCORE_SUMMARY_DECIMALS,
    };

    for (const record of this.matching(agentId, filter)) {
      summary.total++;
      if (record.revoked) {
        summary.revoked++;
        continue;
      }

      summary.active++;
      summary[record.sentiment]++;
      if (record.score) {
        summary.scoreCount++;
        summary.scoreSum += normalizeScore(record.score);
      }
    }
    return summary;
  }

  // -------------------------------------------------------------------------
  // Internals

  private matching(agentId: number, filter: FeedbackFilter): FeedbackRecord[] {
    requireAgent(this.authority, agentId);
    const authors = filter.authors?.map((address) => address.toLowerCase());
    const tag1 = filter.tag1 ?? "";
    const tag2 = filter.tag2 ?? "";

    return (this.store.feedback.get(agentId) ?? []).filter((record) => {
      if (authors && authors.length > 0 && !authors.includes(record.author.toLowerCase())) {
        return false;
      }
      if (tag1 && record.tag1 !== tag1) {
        return false;
      }
      return !tag2 || record.tag2 === tag2;
    });
  }

  private requireFeedback(agentId: number, index: number): FeedbackRecord {
    requireAgent(this.authority, agentId);
    const record = this.store.feedback.get(agentId)?.[index];
    if (!Number.isInteger(index) || !record) {
      throw new RegistryError("FEEDBACK_NOT_FOUND", `agent ${agentId} has no feedback ${index}`, { agentId, index });
    }
    return record;
  }

  private emit(event: DistributiveOmit<ReputationEvent, "registry">): void {
    this.events.emit({ registry: "reputation", ...event });
  }
}

function checkSentiment(value: string): Sentiment {
  const match = SENTIMENTS.find((sentiment) => sentiment === value);
  if (!match) {
    throw new RegistryError("INVALID_ARGUMENT", `sentiment must be one of ${SENTIMENTS.join(", ")}`, { value });
  }
  return match;
}

function checkScore(score: FeedbackScore): FeedbackScore {
  if (!Number.isInteger(score.decimals) || score.decimals < 0 || score.decimals > MAX_SCORE_DECIMALS) {
    throw new RegistryError("INVALID_ARGUMENT", `score decimals must be between 0 and ${MAX_SCORE_DECIMALS}`, {
      decimals: score.decimals,
    });
  }
  if (score.value > MAX_INT128 || score.value < MIN_INT128) {
    throw new RegistryError("INVALID_ARGUMENT", "score value must fit in a signed 128-bit integer");
  }
  return { value: score.value, decimals: score.decimals };
}

export function normalizeScore(score: FeedbackScore): bigint {
  return score.value * 10n ** BigInt(SCORE_SUMMARY_DECIMALS - score.decimals);
}

function toView(agentId: number, record: FeedbackRecord): FeedbackView {
  return {
    agentId,
    ...record,
    score: record.score ? { ...record.score } : null,
    responses: record.responses.map((response) => ({ ...response })),
  };
}
