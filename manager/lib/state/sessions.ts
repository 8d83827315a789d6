/**
 * SessionRegistry - owns the table of live forwarding sessions.
 *
 * Port allocation plus inserting the pending record happens in one
 * synchronous section, and so does port release plus record removal. Provider
 * work for a session runs inside that session's operation queue, so a close
 * never overlaps the open (or another close) of the same session.
 */

import { randomUUID } from 'crypto';
import * as net from 'net';
import {
  NotFoundError,
  ProviderUnavailableError,
  ProvisioningError,
  TeardownError,
  ValidationError,
  errorDetails,
} from '../errors';
import { log } from '../logger';
import { OperationQueue } from '../op-queue';
import type { PortPool } from '../ports';
import type { ListedGroups, NatRuleProvider } from '../../services/nat-provider';
import { describeFailure } from '../../services/nat-provider';
import { Provisioner, withProviderTimeout } from '../../services/provisioning';
import type { ProvisioningContext } from '../../services/provisioning';
import { buildRuleGroupId, canTransition, toSummary } from './types';
import type { HealthReport, Session, SessionState, SessionSummary } from './types';

export interface SessionRegistryOptions {
  ruleGroupPrefix: string;
  providerTimeoutMs: number;
}

export interface CloseAllResult {
  closed: number;
  warnings: number;
}

function contextOf(session: Session): ProvisioningContext {
  return { ruleGroupId: session.ruleGroupId, ingressPort: session.ingressPort, target: session.target };
}

function snapshot(session: Session): Session {
  return { ...session, target: { ...session.target } };
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly provisioner: Provisioner;
  private readonly queue = new OperationQueue('session');

  constructor(
    private readonly provider: NatRuleProvider,
    private readonly pool: PortPool,
    private readonly options: SessionRegistryOptions,
  ) {
    this.provisioner = new Provisioner(provider, options.providerTimeoutMs);
  }

  // No outer bound when the provider already bounds each call from its start
  private get callTimeoutMs(): number | null {
    return this.provider.boundsOwnCalls ? null : this.options.providerTimeoutMs;
  }

  private transition(session: Session, to: SessionState): void {
    if (!canTransition(session.state, to)) {
      throw new Error(`Illegal session transition ${session.state} -> ${to} (${session.id})`);
    }
    log.session(`${session.state} -> ${to}`, { sessionId: session.id, ingressPort: session.ingressPort });
    session.state = to;
  }

  /**
   * Drop the record and return its port. Synchronous: nothing interleaves.
   */
  private reclaim(session: Session): void {
    this.transition(session, 'closed');
    this.sessions.delete(session.id);
    this.pool.release(session.ingressPort);
  }

  private validateTarget(targetIp: unknown, targetPort: unknown): { ip: string; port: number } {
    // Zone ids (fe80::1%eth0) pass net.isIP but cannot be a DNAT destination
    if (typeof targetIp !== 'string' || net.isIP(targetIp) === 0 || targetIp.includes('%')) {
      throw new ValidationError('target_ip must be an IPv4 or IPv6 address', { targetIp: String(targetIp) });
    }
    if (typeof targetPort !== 'number' || !Number.isInteger(targetPort) || targetPort < 1 || targetPort > 65535) {
      throw new ValidationError('target_port must be an integer between 1 and 65535', { targetPort: String(targetPort) });
    }
    const version = net.isIPv6(targetIp) ? 6 : 4;
    if (!this.provider.supportsIpVersion(version)) {
      throw new ValidationError(`IPv${version} targets are not supported by the configured NAT table`, { targetIp });
    }
    return { ip: targetIp, port: targetPort };
  }

  /**
   * Open a forwarding session from a fresh ingress port to the target.
   * @throws {ValidationError} Malformed or unsupported target
   * @throws {ResourceExhaustedError} No free ingress port
   * @throws {ProvisioningError} Rule install failed (rolled back, port released)
   */
  async open(targetIp: unknown, targetPort: unknown): Promise<Session> {
    const target = this.validateTarget(targetIp, targetPort);

    const id = randomUUID();
    const ingressPort = this.pool.allocate();
    const session: Session = {
      id,
      ingressPort,
      target,
      ruleGroupId: buildRuleGroupId(this.options.ruleGroupPrefix, id),
      state: 'pending',
      createdAt: new Date().toISOString(),
    };
    this.sessions.set(id, session);
    log.session('Opening', { sessionId: id, ingressPort, target: `${target.ip}:${target.port}` });

    return this.queue.run(id, async () => {
      const timer = log.startTimer('install');
      const outcome = await this.provisioner.install(contextOf(session));
      timer.done({ sessionId: id, ok: outcome.ok });
      if (!outcome.ok) {
        this.reclaim(session);
        const { failure, rollbackFailures } = outcome;
        throw new ProvisioningError(`Failed to install forwarding rules at step ${failure.step}`, {
          step: failure.step,
          command: failure.command,
          exitCode: failure.exitCode,
          stderr: failure.stderr,
          rollbackFailures,
        });
      }
      this.transition(session, 'active');
      log.audit('Session opened', {
        sessionId: id,
        ingressPort,
        targetIp: target.ip,
        targetPort: target.port,
      });
      return snapshot(session);
    });
  }

  /**
   * Close a session. Its port is always released, even when rule removal fails.
   * @throws {NotFoundError} Unknown or already closed session
   * @throws {TeardownError} Some rules could not be removed (session still reclaimed)
   */
  close(sessionId: string): Promise<void> {
    return this.queue.run(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      // Queued behind its own open, so a session seen here is active or already gone
      if (!session || session.state !== 'active') {
        throw new NotFoundError('Session not found', { sessionId });
      }

      this.transition(session, 'closing');
      const failures = await this.provisioner.teardown(contextOf(session));
      this.reclaim(session);
      log.audit('Session closed', {
        sessionId,
        ingressPort: session.ingressPort,
        teardownFailures: failures.length,
      });

      if (failures.length > 0) {
        throw new TeardownError('Some forwarding rules could not be removed; session reclaimed', {
          sessionId,
          failures,
        });
      }
    });
  }

  /**
   * Active sessions only; pending and closing ones are never listed
   */
  list(): SessionSummary[] {
    return Array.from(this.sessions.values())
      .filter(s => s.state === 'active')
      .map(toSummary);
  }

  get(sessionId: string): SessionSummary | null {
    const session = this.sessions.get(sessionId);
    return session && session.state === 'active' ? toSummary(session) : null;
  }

  get activeCount(): number {
    return this.list().length;
  }

  /**
   * Make sure the provider's base hooks exist. Safe to call repeatedly.
   * @throws {ProviderUnavailableError} Provider unreachable or hooks cannot be created
   */
  async bootstrap(): Promise<void> {
    const result = await withProviderTimeout('ensure-base-hooks', this.callTimeoutMs,
      () => this.provider.ensureBaseHooks());
    if (!result.ok) {
      throw new ProviderUnavailableError('NAT provider unavailable: base hooks could not be ensured', {
        command: result.command,
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    log.info('NAT base hooks ready', { detail: result.stdout });
  }

  async health(): Promise<HealthReport> {
    const probe = await withProviderTimeout('list-tables', this.callTimeoutMs,
      () => this.provider.listTables());
    const report: HealthReport = {
      providerReachable: probe.ok,
      activeSessions: this.activeCount,
      freePorts: this.pool.freeCount,
      totalPorts: this.pool.size,
    };
    if (!probe.ok) {
      report.providerError = describeFailure(probe);
      log.warn('NAT provider health probe failed', { error: report.providerError });
    }
    return report;
  }

  /**
   * Remove rule groups carrying our prefix that no live session owns
   * (left behind by a previous process).
   * @returns Names of the groups removed
   * @throws {ProviderUnavailableError} Groups could not be listed
   */
  async sweepOrphans(): Promise<string[]> {
    const timeoutMs = this.callTimeoutMs;
    const listed = await withProviderTimeout<ListedGroups>('list-groups', timeoutMs,
      () => this.provider.listGroups(this.options.ruleGroupPrefix));
    if (!listed.ok) {
      throw new ProviderUnavailableError('Could not list rule groups for orphan sweep', {
        error: describeFailure(listed),
      });
    }

    const owned = new Set(Array.from(this.sessions.values()).map(s => s.ruleGroupId));
    const removed: string[] = [];

    for (const group of listed.groups.filter(g => !owned.has(g))) {
      const steps = [
        () => this.provider.removeTaggedRules(group),
        () => this.provider.flushGroup(group),
        () => this.provider.deleteGroup(group),
      ];
      let failed = false;
      for (const step of steps) {
        const result = await withProviderTimeout(`sweep ${group}`, timeoutMs, step);
        if (!result.ok) {
          log.warn('Failed to remove orphaned rule group', { group, error: describeFailure(result) });
          failed = true;
          break;
        }
      }
      if (!failed) {
        removed.push(group);
      }
    }

    if (removed.length > 0) {
      log.info(`Removed ${removed.length} orphaned rule group(s)`, { groups: removed });
    }
    return removed;
  }

  /**
   * Close every live session (shutdown). Pending sessions are closed once
   * their install settles; sessions opened meanwhile are picked up by a
   * further pass.
   */
  async closeAll(): Promise<CloseAllResult> {
    let closed = 0;
    let warnings = 0;
    const attempted = new Set<string>();

    for (;;) {
      const ids = Array.from(this.sessions.keys()).filter(id => !attempted.has(id));
      if (ids.length === 0) break;
      ids.forEach(id => attempted.add(id));

      const results = await Promise.allSettled(ids.map(id => this.close(id)));
      results.forEach((result, i) => {
        if (result.status === 'fulfilled') {
          closed++;
        } else if (result.reason instanceof TeardownError) {
          closed++;
          warnings++;
        } else if (!(result.reason instanceof NotFoundError)) {
          log.error('Failed to close session during shutdown', { sessionId: ids[i], ...errorDetails(result.reason) });
        }
      });
    }

    log.info('Closed all sessions', { closed, warnings });
    return { closed, warnings };
  }
}
