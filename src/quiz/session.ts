export type SessionState = 'NEW' | 'AWAITING_START' | 'IN_PROGRESS' | 'COMPLETED';

export interface Session {
  userId: string;
  state: SessionState;
  /** Current question; only meaningful while `IN_PROGRESS`. */
  questionIndex: number;
  score: number;
  /** Epoch millis of the last committed update. */
  updatedAt: number;
}

export function createSession(userId: string, now: number): Session {
  return { userId, state: 'NEW', questionIndex: 0, score: 0, updatedAt: now };
}
