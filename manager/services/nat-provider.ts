/**
 * NAT Rule Provider interface
 *
 * The narrow capability set the provisioning protocol needs from a
 * packet-filter engine. Every call resolves to a ProviderResult; none reject.
 * The nftables implementation lives in ./nftables, tests use an in-memory fake.
 */

import type { Protocol } from '../lib/state/types';

export interface ProviderSuccess {
  ok: true;
  command: string;
  stdout: string;
}

export interface ProviderFailure {
  ok: false;
  command: string;
  exitCode: number | null;
  stderr: string;
}

export type ProviderResult = ProviderSuccess | ProviderFailure;

export type ListedGroups = ProviderSuccess & { groups: string[] };

export type GroupListResult = ListedGroups | ProviderFailure;

export type IpVersion = 4 | 6;

export interface NatRuleProvider {
  /**
   * True when every call is already bounded from the moment it starts running
   * (queued calls included). Callers then add no timeout of their own.
   */
  readonly boundsOwnCalls: boolean;

  /** Create the ingress-dispatch and egress-masquerade hook chains if absent */
  ensureBaseHooks(): Promise<ProviderResult>;

  createGroup(name: string): Promise<ProviderResult>;
  flushGroup(name: string): Promise<ProviderResult>;
  deleteGroup(name: string): Promise<ProviderResult>;

  addRedirectRule(
    group: string,
    protocol: Protocol,
    ingressPort: number,
    targetIp: string,
    targetPort: number,
  ): Promise<ProviderResult>;

  addDispatchRule(ingressPort: number, group: string): Promise<ProviderResult>;
  removeDispatchRule(ingressPort: number, group: string): Promise<ProviderResult>;

  /** Masquerade rules are tagged with the owning group so they can be found again */
  addReturnMasqueradeRule(group: string, protocol: Protocol, targetIp: string, targetPort: number): Promise<ProviderResult>;
  removeReturnMasqueradeRule(group: string, protocol: Protocol, targetIp: string, targetPort: number): Promise<ProviderResult>;

  /** Liveness probe */
  listTables(): Promise<ProviderResult>;

  /** Names of existing rule groups starting with `prefix` */
  listGroups(prefix: string): Promise<GroupListResult>;

  /** Remove every hook-chain rule tagged with `group` */
  removeTaggedRules(group: string): Promise<ProviderResult>;

  /** Whether the provider's table can carry targets of this IP version */
  supportsIpVersion(version: IpVersion): boolean;
}

/**
 * One-line description of a failed provider call for logs and error details
 */
export function describeFailure(result: ProviderFailure): string {
  const status = result.exitCode === null ? 'no exit code' : `exit ${result.exitCode}`;
  return `${result.command} (${status}): ${result.stderr || 'no diagnostic output'}`;
}
