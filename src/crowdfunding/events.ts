import type { Logger } from "pino";
import type { Clock, PublicKeyLike } from "./types.js";
import { makeNoopLogger } from "../logger.js";

export type RegistryEvent =
  | {
      type: "ProposalSubmitted";
      proposalId: number;
      submitter: PublicKeyLike;
      minTarget: number;
      maxTarget: number;
      windowStart: number;
      windowEnd: number;
    }
  | { type: "ProposalReviewed"; proposalId: number; approved: boolean }
  | { type: "LedgerDeployed"; proposalId: number; ledger: PublicKeyLike; creator: PublicKeyLike }
  | { type: "ReviewerChanged"; previousReviewer: PublicKeyLike; newReviewer: PublicKeyLike };

export type LedgerEvent =
  | { type: "ContributionRecorded"; ledger: PublicKeyLike; contributor: PublicKeyLike; asset: PublicKeyLike; amount: number }
  | { type: "FundsClaimed"; ledger: PublicKeyLike; creator: PublicKeyLike; amount: number }
  | { type: "CampaignEnded"; ledger: PublicKeyLike; successful: boolean; totalCollected: number }
  | { type: "RefundProcessed"; ledger: PublicKeyLike; contributor: PublicKeyLike; amount: number };

export type CampaignEvent = RegistryEvent | LedgerEvent;

export type CampaignEventType = CampaignEvent["type"];

export interface EventSink {
  emit(event: CampaignEvent): void;
}

export type RecordedEvent = CampaignEvent & {
  sequence: number;
  timestamp: number;
};

export type EventListener = (event: RecordedEvent) => void;

/**
 * In-memory event history with subscribers, for indexers and tests.
 */
export class EventLog implements EventSink {
  private readonly events: RecordedEvent[] = [];
  private readonly listeners = new Set<EventListener>();
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(clock: Clock, logger?: Logger) {
    this.clock = clock;
    this.logger = logger;
  }

  emit(event: CampaignEvent): void {
    const recorded: RecordedEvent = { ...event, sequence: this.events.length, timestamp: this.clock.now() };
    this.events.push(recorded);

    // The emitting operation has already committed; a failing listener is reported, not propagated.
    for (const listener of this.listeners) {
      try {
        listener(recorded);
      } catch (err) {
        this.logger?.error({ err, event: recorded.type, sequence: recorded.sequence }, "event listener failed");
      }
    }
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getEvents(): RecordedEvent[] {
    return [...this.events];
  }

  ofType<T extends CampaignEventType>(type: T): Array<Extract<CampaignEvent, { type: T }> & RecordedEvent> {
    return this.events.filter((e): e is Extract<CampaignEvent, { type: T }> & RecordedEvent => e.type === type);
  }
}

export class LoggingEventSink implements EventSink {
  constructor(private readonly logger: Logger) {}

  emit(event: CampaignEvent): void {
    const { type, ...fields } = event;
    this.logger.info({ event: type, ...fields }, type);
  }
}

/**
 * Forwards every event to each sink in order. A sink that throws is logged
 * and the remaining sinks still receive the event.
 */
export function fanOut(sinks: EventSink[], logger: Logger = makeNoopLogger()): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) {
        try {
          sink.emit(event);
        } catch (err) {
          logger.error({ err, event: event.type }, "event sink failed");
        }
      }
    }
  };
}

export const NOOP_SINK: EventSink = {
  emit() {}
};
