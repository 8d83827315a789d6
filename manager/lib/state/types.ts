/**
 * Session state types and utility functions
 *
 * This module contains:
 * - Interface definitions for forwarding sessions
 * - The session state machine's transition table
 * - Rule group naming
 */

// ============================================
// Interfaces
// ============================================

export type Protocol = 'udp' | 'tcp';

/**
 * Session lifecycle: pending -> active -> closing -> closed.
 * A failed install goes straight from pending to closed.
 */
export type SessionState = 'pending' | 'active' | 'closing' | 'closed';

export interface TargetEndpoint {
  ip: string;
  port: number;
}

/**
 * Internal session record (owned by SessionRegistry, never handed out as-is)
 */
export interface Session {
  id: string;
  ingressPort: number;
  target: TargetEndpoint;
  ruleGroupId: string;
  state: SessionState;
  createdAt: string;
}

/**
 * Public view of an active session: no provider handles
 */
export interface SessionSummary {
  id: string;
  ingressPort: number;
  target: TargetEndpoint;
  createdAt: string;
}

/**
 * Health probe result
 */
export interface HealthReport {
  providerReachable: boolean;
  providerError?: string;
  activeSessions: number;
  freePorts: number;
  totalPorts: number;
}

// ============================================
// State machine
// ============================================

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  pending: ['active', 'closed'],
  active: ['closing'],
  closing: ['closed'],
  closed: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

// ============================================
// Utility functions
// ============================================

/**
 * Derive the provider-side rule group name for a session.
 * nft chain names cannot contain '-', so UUID dashes become underscores.
 * Example: proxy_3f2b1c4d_...
 */
export function buildRuleGroupId(prefix: string, sessionId: string): string {
  return `${prefix}${sessionId.replace(/-/g, '_')}`;
}

export function toSummary(session: Session): SessionSummary {
  return {
    id: session.id,
    ingressPort: session.ingressPort,
    target: { ...session.target },
    createdAt: session.createdAt,
  };
}
