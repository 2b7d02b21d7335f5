// Subscriber, as read from the user-management collaborator
export interface Subscriber {
  id: string;
  phoneNumber: string;
  timezone: string; // IANA timezone
  windowStartHour: number; // local hour, inclusive
  windowEndHour: number; // local hour, exclusive
  active: boolean;
}

export interface SubscriberDirectory {
  listActiveSubscribers(): Promise<Subscriber[]>;
  findSubscriber(id: string): Promise<Subscriber | null>;
}

export interface GeneratedMessage {
  content: string;
  fingerprint: string;
}

/**
 * Produces message content. Rejects with GenerationError.
 */
export interface MessageGenerator {
  generateMessage(subscriberId: string, recentFingerprints: string[]): Promise<GeneratedMessage>;
}

/**
 * Delivers an SMS and resolves with the gateway receipt id. Rejects with SendError.
 */
export interface MessageSender {
  send(phoneNumber: string, content: string): Promise<string>;
}

export interface HistoryStore {
  recentFingerprints(subscriberId: string, limit: number): Promise<string[]>;
  record(subscriberId: string, fingerprint: string): Promise<void>;
}

export interface BreakerStats {
  status: 'open' | 'closed';
  failures: number;
  rejects: number;
  timeouts: number;
}

/**
 * External dependency guarded by a circuit breaker
 */
export interface BreakerGuarded {
  getStats(): BreakerStats;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  message?: string;
  data?: T;
  error?: string;
  trace_id?: string;
}
