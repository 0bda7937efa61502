/**
 * Common types used across the system
 */

export interface SessionContext {
  sessionId: string;
  surface?: string;
}

export interface Usage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  model?: string;
}
